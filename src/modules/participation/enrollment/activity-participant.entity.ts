// src/modules/participation/enrollment/activity-participant.entity.ts
import { ActivityEntity } from '@modules/activities/activity.entity';
import { UserEntity } from '@modules/users/user.entity';
import { CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';

/**
 * 活动报名实体（活动 ⇄ 用户 多对多关联）
 * 对应数据库表：activity_participants
 * 复合主键保证同一用户在同一活动中最多报名一次；任一端删除时级联删除报名
 */
@Entity('activity_participants')
@Index('idx_activity_participants_user', ['userId'])
export class ActivityParticipantEntity {
  /** 活动 ID */
  @PrimaryColumn({ name: 'activity_id', type: 'int' })
  activityId!: number;

  /** 用户 ID */
  @PrimaryColumn({ name: 'user_id', type: 'int' })
  userId!: number;

  /** 报名时间 */
  @CreateDateColumn({ name: 'enrolled_at', type: 'datetime' })
  enrolledAt!: Date;

  @ManyToOne(() => ActivityEntity, (activity) => activity.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'activity_id' })
  activity?: ActivityEntity;

  @ManyToOne(() => UserEntity, (user) => user.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;
}
