// src/adapters/http/admin/admin.controller.ts
import { DatabaseBackupService } from '@modules/maintenance/database-backup.service';
import { Controller, Get } from '@nestjs/common';

/** 备份接口响应 */
export type BackupResponse =
  | { message: 'Backup created successfully'; backup_path: string }
  | { message: 'Backup not available for this database type' };

/**
 * 管理接口：数据库备份
 */
@Controller('admin')
export class AdminController {
  constructor(private readonly backupService: DatabaseBackupService) {}

  @Get('backup')
  async backup(): Promise<BackupResponse> {
    const backupPath = await this.backupService.createBackup();
    if (backupPath === null) {
      return { message: 'Backup not available for this database type' };
    }
    return { message: 'Backup created successfully', backup_path: backupPath };
  }
}
