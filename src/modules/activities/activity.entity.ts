// src/modules/activities/activity.entity.ts
import { ActivityParticipantEntity } from '@modules/participation/enrollment/activity-participant.entity';
import { UserEntity } from '@modules/users/user.entity';
import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * 课外活动实体
 * 对应数据库表：activities
 * available_spots / is_full 为派生值，由容量策略按参与人数计算，不落库
 */
@Entity('activities')
@Check('positive_max_participants', 'max_participants > 0')
@Check('min_name_length', 'LENGTH(name) >= 3')
@Check('min_description_length', 'LENGTH(description) >= 10')
export class ActivityEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 活动名称（唯一，去首尾空格） */
  @Index('uk_activities_name', { unique: true })
  @Column({ name: 'name', type: 'varchar', length: 255, nullable: false })
  name!: string;

  /** 活动描述 */
  @Column({ name: 'description', type: 'text', nullable: false })
  description!: string;

  /** 时间安排（自由文本） */
  @Column({ name: 'schedule', type: 'varchar', length: 500, nullable: false })
  schedule!: string;

  /** 容量上限 */
  @Column({ name: 'max_participants', type: 'int', nullable: false })
  maxParticipants!: number;

  /**
   * 创建时间
   * 插入时总会写入；列允许为空是为了兼容旧数据，由修复流程补齐
   */
  @Column({ name: 'created_at', type: 'datetime', nullable: true })
  createdAt!: Date | null;

  /** 创建者用户 ID */
  @Column({ name: 'created_by', type: 'int', nullable: true })
  createdBy!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true })
  @JoinColumn({ name: 'created_by' })
  creator?: UserEntity | null;

  /** 报名记录（参与者） */
  @OneToMany(() => ActivityParticipantEntity, (enrollment) => enrollment.activity)
  enrollments?: ActivityParticipantEntity[];
}
