// src/usecases/enrollment/signup-for-activity.usecase.ts

import { isFull } from '@core/activity/policy/capacity.policy';
import { DomainError, ENROLLMENT_ERROR } from '@core/common/errors/domain-error';
import { translateStorageError } from '@core/database/storage-error.translator';
import { ActivitiesService } from '@modules/activities/activities.service';
import { ActivityEntity } from '@modules/activities/activity.entity';
import { ActivityEnrollmentService } from '@modules/participation/enrollment/activity-enrollment.service';
import { UsersService } from '@modules/users/users.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource, EntityManager } from 'typeorm';
import { EnrollmentCommand, EnrollmentOutcome } from './enrollment.types';

/**
 * 学生报名活动用例
 *
 * 规则（按顺序检查）：
 * - 活动不存在 → ACTIVITY_NOT_FOUND
 * - 活动已满 → CAPACITY_EXCEEDED
 * - 邮箱首次出现时创建用户；邮箱格式不合法 → VALIDATION_ERROR
 * - 已报名 → ALREADY_ENROLLED
 * - 事务：用户创建与报名写入要么同时生效，要么都不生效
 * - 报名写入带容量条件；并发下读到的"未满"已过期时仍以写入结果为准
 */
@Injectable()
export class SignupForActivityUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly activitiesService: ActivitiesService,
    private readonly usersService: UsersService,
    private readonly enrollmentService: ActivityEnrollmentService,
    @InjectPinoLogger(SignupForActivityUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * 执行报名
   * @param input 活动名称与邮箱
   * @returns 成功消息
   */
  async execute(input: EnrollmentCommand): Promise<EnrollmentOutcome> {
    try {
      await this.dataSource.transaction(async (manager) => {
        const activity = await this.ensureActivityOrThrow(input.activityName, manager);
        this.ensureHasCapacityOrThrow(activity);

        const resolved = await this.usersService.resolveOrCreateByEmail(input.email, manager);
        const key = { activityId: activity.id, userId: resolved.user.id };
        if (await this.enrollmentService.isEnrolled(key, manager)) {
          throw new DomainError(ENROLLMENT_ERROR.ALREADY_ENROLLED, 'Student is already signed up');
        }

        const inserted = await this.enrollmentService.addParticipantWithinCapacity(key, manager);
        if (!inserted) {
          throw new DomainError(ENROLLMENT_ERROR.CAPACITY_EXCEEDED, 'Activity is full');
        }

        this.logger.info(
          { activityId: activity.id, userId: resolved.user.id, userResolution: resolved.kind },
          '报名成功',
        );
      });
    } catch (error) {
      // 原始错误作为 cause 保留，由全局异常过滤器统一记录
      throw translateStorageError(error, 'Error processing signup request');
    }

    return { message: `Signed up ${input.email} for ${input.activityName}` };
  }

  private async ensureActivityOrThrow(
    activityName: string,
    manager: EntityManager,
  ): Promise<ActivityEntity> {
    const activity = await this.activitiesService.findByName(activityName, manager);
    if (!activity) {
      throw new DomainError(ENROLLMENT_ERROR.ACTIVITY_NOT_FOUND, 'Activity not found');
    }
    return activity;
  }

  private ensureHasCapacityOrThrow(activity: ActivityEntity): void {
    const count = activity.enrollments?.length ?? 0;
    if (isFull(activity.maxParticipants, count)) {
      throw new DomainError(ENROLLMENT_ERROR.CAPACITY_EXCEEDED, 'Activity is full');
    }
  }
}
