// src/modules/maintenance/maintenance.module.ts

import { Module } from '@nestjs/common';
import { DatabaseBackupService } from './database-backup.service';

/**
 * 数据维护模块：数据库文件备份
 */
@Module({
  providers: [DatabaseBackupService],
  exports: [DatabaseBackupService],
})
export class MaintenanceModule {}
