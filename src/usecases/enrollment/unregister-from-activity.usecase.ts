// src/usecases/enrollment/unregister-from-activity.usecase.ts

import { DomainError, ENROLLMENT_ERROR } from '@core/common/errors/domain-error';
import { translateStorageError } from '@core/database/storage-error.translator';
import { ActivitiesService } from '@modules/activities/activities.service';
import { ActivityEnrollmentService } from '@modules/participation/enrollment/activity-enrollment.service';
import { UsersService } from '@modules/users/users.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { EnrollmentCommand, EnrollmentOutcome } from './enrollment.types';

/**
 * 学生退出活动用例
 *
 * 规则：
 * - 活动不存在 → ACTIVITY_NOT_FOUND
 * - 用户不存在或未报名该活动 → NOT_ENROLLED
 */
@Injectable()
export class UnregisterFromActivityUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly activitiesService: ActivitiesService,
    private readonly usersService: UsersService,
    private readonly enrollmentService: ActivityEnrollmentService,
    @InjectPinoLogger(UnregisterFromActivityUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * 执行退出
   * @param input 活动名称与邮箱
   * @returns 成功消息
   */
  async execute(input: EnrollmentCommand): Promise<EnrollmentOutcome> {
    try {
      await this.dataSource.transaction(async (manager) => {
        const activity = await this.activitiesService.findByName(input.activityName, manager);
        if (!activity) {
          throw new DomainError(ENROLLMENT_ERROR.ACTIVITY_NOT_FOUND, 'Activity not found');
        }

        const user = await this.usersService.findByEmail(input.email, manager);
        const removed = user
          ? await this.enrollmentService.removeParticipant(
              { activityId: activity.id, userId: user.id },
              manager,
            )
          : false;
        if (!removed) {
          throw new DomainError(
            ENROLLMENT_ERROR.NOT_ENROLLED,
            'Student is not signed up for this activity',
          );
        }

        this.logger.info({ activityId: activity.id, userId: user?.id }, '退出活动成功');
      });
    } catch (error) {
      // 原始错误作为 cause 保留，由全局异常过滤器统一记录
      throw translateStorageError(error, 'Error processing unregister request');
    }

    return { message: `Unregistered ${input.email} from ${input.activityName}` };
  }
}
