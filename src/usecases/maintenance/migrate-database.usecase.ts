// src/usecases/maintenance/migrate-database.usecase.ts

import { ActivitiesService } from '@modules/activities/activities.service';
import { DatabaseBackupService } from '@modules/maintenance/database-backup.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { BootstrapSeedDataUsecase } from './bootstrap-seed-data.usecase';
import { HealActivityTimestampsUsecase } from './heal-activity-timestamps.usecase';
import { MigrateResult } from './maintenance.types';

/**
 * 数据库迁移用例
 *
 * 流程：
 * 1. 备份（失败只记录日志，不阻塞迁移）
 * 2. 按实体同步表结构
 * 3. 活动表为空 → 写入初始数据；否则 → 补齐缺失的创建时间
 */
@Injectable()
export class MigrateDatabaseUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly backupService: DatabaseBackupService,
    private readonly activitiesService: ActivitiesService,
    private readonly bootstrapSeedData: BootstrapSeedDataUsecase,
    private readonly healActivityTimestamps: HealActivityTimestampsUsecase,
    @InjectPinoLogger(MigrateDatabaseUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  async execute(): Promise<MigrateResult> {
    const backupPath = await this.tryBackup();

    await this.dataSource.synchronize();
    this.logger.info('表结构已同步');

    if ((await this.activitiesService.count()) === 0) {
      const bootstrap = await this.bootstrapSeedData.execute();
      return { backupPath, outcome: { kind: 'seeded', bootstrap } };
    }

    const { healed } = await this.healActivityTimestamps.execute();
    return { backupPath, outcome: { kind: 'healed', healed } };
  }

  private async tryBackup(): Promise<string | null> {
    try {
      return await this.backupService.createBackup();
    } catch (error) {
      this.logger.warn({ err: error }, '迁移前备份失败，继续迁移');
      return null;
    }
  }
}
