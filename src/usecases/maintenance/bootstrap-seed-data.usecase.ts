// src/usecases/maintenance/bootstrap-seed-data.usecase.ts

import { translateStorageError } from '@core/database/storage-error.translator';
import { ActivitiesService } from '@modules/activities/activities.service';
import { CANONICAL_ROSTER, CanonicalRoster } from '@modules/maintenance/seed/canonical-roster';
import { ActivityEnrollmentService } from '@modules/participation/enrollment/activity-enrollment.service';
import { UsersService } from '@modules/users/users.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource, EntityManager } from 'typeorm';
import { BootstrapResult } from './maintenance.types';

const NOT_SEEDED: BootstrapResult = {
  seeded: false,
  activitiesCreated: 0,
  usersCreated: 0,
  enrollmentsCreated: 0,
};

/**
 * 初始化数据用例（幂等）
 *
 * 规则：
 * - 活动表非空时不做任何写入
 * - 活动表为空时在单事务内写入 9 个活动，再按初始报名关系获取或创建用户并报名
 * - 报名前先显式查询是否已存在，避免重复写入
 */
@Injectable()
export class BootstrapSeedDataUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly activitiesService: ActivitiesService,
    private readonly usersService: UsersService,
    private readonly enrollmentService: ActivityEnrollmentService,
    @InjectPinoLogger(BootstrapSeedDataUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * 执行初始化
   * @param roster 初始数据，默认使用内置名单
   */
  async execute(roster: CanonicalRoster = CANONICAL_ROSTER): Promise<BootstrapResult> {
    try {
      const result = await this.dataSource.transaction((manager) => this.seed(roster, manager));
      if (result.seeded) this.logger.info(result, '初始数据写入完成');
      return result;
    } catch (error) {
      this.logger.error({ err: error }, '初始数据写入失败');
      throw translateStorageError(error, 'Error seeding initial data');
    }
  }

  private async seed(roster: CanonicalRoster, manager: EntityManager): Promise<BootstrapResult> {
    if ((await this.activitiesService.count(manager)) > 0) return NOT_SEEDED;

    for (const activity of roster.activities) {
      await this.activitiesService.create(activity, manager);
    }

    let usersCreated = 0;
    let enrollmentsCreated = 0;
    for (const pair of roster.enrollments) {
      const activity = await this.activitiesService.findByName(pair.activityName, manager);
      if (!activity) {
        this.logger.warn({ activityName: pair.activityName }, '初始报名关系引用了不存在的活动');
        continue;
      }

      const resolved = await this.usersService.resolveOrCreateByEmail(pair.email, manager);
      if (resolved.kind === 'created') usersCreated += 1;

      const key = { activityId: activity.id, userId: resolved.user.id };
      if (await this.enrollmentService.isEnrolled(key, manager)) continue;
      await this.enrollmentService.addParticipant(key, manager);
      enrollmentsCreated += 1;
    }

    return {
      seeded: true,
      activitiesCreated: roster.activities.length,
      usersCreated,
      enrollmentsCreated,
    };
  }
}
