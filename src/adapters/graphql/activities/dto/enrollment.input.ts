// src/adapters/graphql/activities/dto/enrollment.input.ts
import { Field, InputType } from '@nestjs/graphql';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * 报名 / 退出活动输入参数
 * 邮箱格式在存储边界统一校验
 */
@InputType({ description: '报名 / 退出活动' })
export class EnrollmentInput {
  @Field(() => String, { description: '活动名称' })
  @IsString({ message: 'activityName must be a string' })
  @IsNotEmpty({ message: 'activityName is required' })
  activityName!: string;

  @Field(() => String, { description: '学生邮箱' })
  @IsString({ message: 'email must be a string' })
  @IsNotEmpty({ message: 'email is required' })
  @MaxLength(255, { message: 'email must be at most 255 characters long' })
  email!: string;
}
