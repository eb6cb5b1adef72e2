// src/adapters/graphql/activities/dto/enrollment.result.ts
import { Field, ObjectType } from '@nestjs/graphql';

@ObjectType({ description: '报名 / 退出结果' })
export class EnrollmentResult {
  @Field(() => String, { description: '结果消息' })
  message!: string;
}
