// src/usecases/maintenance/reset-database.usecase.ts

import { DomainError, MAINTENANCE_ERROR } from '@core/common/errors/domain-error';
import { DatabaseBackupService } from '@modules/maintenance/database-backup.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { BootstrapSeedDataUsecase } from './bootstrap-seed-data.usecase';
import { ResetResult } from './maintenance.types';

/** 重置确认口令 */
export const RESET_CONFIRMATION_TOKEN = 'RESET';

/**
 * 重置数据库用例（删除全部数据）
 *
 * 规则：
 * - 确认口令必须严格等于 RESET，否则不做任何操作并抛出 RESET_NOT_CONFIRMED
 * - 备份 → 删除并重建全部表 → 写入初始数据
 * - 备份失败时中止重置
 */
@Injectable()
export class ResetDatabaseUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly backupService: DatabaseBackupService,
    private readonly bootstrapSeedData: BootstrapSeedDataUsecase,
    @InjectPinoLogger(ResetDatabaseUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * @param input.confirmation 用户输入的确认口令
   */
  async execute(input: { readonly confirmation: string }): Promise<ResetResult> {
    if (input.confirmation !== RESET_CONFIRMATION_TOKEN) {
      throw new DomainError(MAINTENANCE_ERROR.RESET_NOT_CONFIRMED, 'Reset cancelled');
    }

    const backupPath = await this.backupService.createBackup();

    await this.dataSource.synchronize(true);
    this.logger.warn({ backupPath }, '已删除并重建全部表');

    const bootstrap = await this.bootstrapSeedData.execute();
    return { backupPath, bootstrap };
  }
}
