// src/usecases/maintenance/maintenance-usecases.module.ts

import { ActivitiesModule } from '@modules/activities/activities.module';
import { MaintenanceModule } from '@modules/maintenance/maintenance.module';
import { ActivityEnrollmentModule } from '@modules/participation/enrollment/activity-enrollment.module';
import { UsersModule } from '@modules/users/users.module';
import { Module } from '@nestjs/common';
import { BootstrapSeedDataUsecase } from './bootstrap-seed-data.usecase';
import { DatabaseHealthUsecase } from './database-health.usecase';
import { HealActivityTimestampsUsecase } from './heal-activity-timestamps.usecase';
import { MigrateDatabaseUsecase } from './migrate-database.usecase';
import { ResetDatabaseUsecase } from './reset-database.usecase';

const MAINTENANCE_USECASES = [
  BootstrapSeedDataUsecase,
  HealActivityTimestampsUsecase,
  MigrateDatabaseUsecase,
  ResetDatabaseUsecase,
  DatabaseHealthUsecase,
];

/**
 * 数据维护用例模块
 * 供 HTTP 管理接口、启动初始化与 migrate 命令行共用
 */
@Module({
  imports: [ActivitiesModule, UsersModule, ActivityEnrollmentModule, MaintenanceModule],
  providers: [...MAINTENANCE_USECASES],
  exports: [...MAINTENANCE_USECASES, MaintenanceModule],
})
export class MaintenanceUsecasesModule {}
