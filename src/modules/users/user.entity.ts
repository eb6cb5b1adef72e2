// src/modules/users/user.entity.ts
import { UserRole } from '@app-types/models/user.types';
import { ActivityParticipantEntity } from '@modules/participation/enrollment/activity-participant.entity';
import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * 用户实体（学生 / 教师 / 管理员）
 * 对应数据库表：users
 * 邮箱在写入前由实体订阅者统一去空格、转小写并校验形状
 */
@Entity('users')
@Check('valid_role', `role IN ('student', 'teacher', 'admin')`)
@Check('valid_email_format', `email LIKE '%@%'`)
export class UserEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 登录邮箱（唯一，小写） */
  @Index('uk_users_email', { unique: true })
  @Column({ name: 'email', type: 'varchar', length: 255, nullable: false })
  email!: string;

  /** 显示名称 */
  @Column({ name: 'name', type: 'varchar', length: 255, nullable: true })
  name!: string | null;

  /** 年级 */
  @Column({ name: 'grade', type: 'varchar', length: 10, nullable: true })
  grade!: string | null;

  /** 学号（唯一，可空） */
  @Index('uk_users_student_id', { unique: true })
  @Column({ name: 'student_id', type: 'varchar', length: 50, nullable: true })
  studentId!: string | null;

  /** 角色 */
  @Column({ name: 'role', type: 'varchar', length: 50, nullable: false, default: UserRole.STUDENT })
  role!: UserRole;

  /** 创建时间 */
  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;

  /** 报名记录 */
  @OneToMany(() => ActivityParticipantEntity, (enrollment) => enrollment.user)
  enrollments?: ActivityParticipantEntity[];
}
