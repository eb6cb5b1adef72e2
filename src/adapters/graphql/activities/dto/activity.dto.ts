// src/adapters/graphql/activities/dto/activity.dto.ts
import { UserRole } from '@app-types/models/user.types';
import { Field, Int, ObjectType } from '@nestjs/graphql';

/**
 * 活动参与者 DTO
 */
@ObjectType({ description: '活动参与者' })
export class ActivityParticipantDTO {
  @Field(() => String, { description: '学生邮箱' })
  email!: string;

  @Field(() => String, { description: '显示名称', nullable: true })
  name!: string | null;

  @Field(() => UserRole, { description: '角色' })
  role!: UserRole;

  @Field(() => Date, { description: '报名时间' })
  enrolledAt!: Date;
}

/**
 * 活动 DTO（含派生的剩余名额与是否已满）
 */
@ObjectType({ description: '课外活动' })
export class ActivityDTO {
  @Field(() => Int, { description: '活动 ID' })
  id!: number;

  @Field(() => String, { description: '活动名称' })
  name!: string;

  @Field(() => String, { description: '活动描述' })
  description!: string;

  @Field(() => String, { description: '时间安排' })
  schedule!: string;

  @Field(() => Int, { description: '容量上限' })
  maxParticipants!: number;

  @Field(() => [ActivityParticipantDTO], { description: '参与者（按报名时间排序）' })
  participants!: ActivityParticipantDTO[];

  @Field(() => Int, { description: '剩余名额' })
  availableSpots!: number;

  @Field(() => Boolean, { description: '是否已满' })
  isFull!: boolean;
}
