// src/usecases/maintenance/database-health.usecase.ts

import { ActivitiesService } from '@modules/activities/activities.service';
import { toFillStatus } from '@modules/activities/activity-summary.mapper';
import { ActivityEnrollmentService } from '@modules/participation/enrollment/activity-enrollment.service';
import { UsersService } from '@modules/users/users.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { DatabaseHealthReport } from './maintenance.types';

/**
 * 数据库健康检查
 * - probe：连通性探测
 * - report：活动 / 用户 / 报名统计与各活动容量状态
 */
@Injectable()
export class DatabaseHealthUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly activitiesService: ActivitiesService,
    private readonly usersService: UsersService,
    private readonly enrollmentService: ActivityEnrollmentService,
    @InjectPinoLogger(DatabaseHealthUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /** 执行一次简单查询，失败时返回 false */
  async probe(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error({ err: error }, '数据库连通性检查失败');
      return false;
    }
  }

  async report(): Promise<DatabaseHealthReport> {
    const activities = await this.activitiesService.listAll();
    const users = await this.usersService.count();
    const totalEnrollments = await this.enrollmentService.count();
    return {
      activities: activities.length,
      users,
      totalEnrollments,
      details: activities.map(toFillStatus),
    };
  }
}
