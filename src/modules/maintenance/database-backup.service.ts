// src/modules/maintenance/database-backup.service.ts

import { DomainError, MAINTENANCE_ERROR } from '@core/common/errors/domain-error';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import type Database from 'better-sqlite3';
import { access, copyFile } from 'fs/promises';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { basename, dirname, extname, join } from 'path';
import { DataSource } from 'typeorm';
import { BetterSqlite3Driver } from 'typeorm/driver/better-sqlite3/BetterSqlite3Driver';

const IN_MEMORY_DATABASE = ':memory:';

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * 备份文件名使用本地时间戳：YYYYMMDD_HHMMSS
 * @param now 时间点
 */
export function formatBackupTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * 生成备份文件路径：与数据库文件同目录，<stem>_backup_<timestamp><ext>
 * @param databasePath 数据库文件路径
 * @param now 时间点
 */
export function buildBackupPath(databasePath: string, now: Date): string {
  const ext = extname(databasePath);
  const stem = basename(databasePath, ext);
  return join(dirname(databasePath), `${stem}_backup_${formatBackupTimestamp(now)}${ext}`);
}

/**
 * 数据库备份服务
 * 仅支持文件型 SQLite；内存库与 MySQL 返回 null 表示不支持
 */
@Injectable()
export class DatabaseBackupService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @InjectPinoLogger(DatabaseBackupService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * 创建备份
   * @param now 时间点（决定文件名）
   * @returns 备份文件路径；不支持或数据库文件不存在时返回 null
   */
  async createBackup(now: Date = new Date()): Promise<string | null> {
    const databaseFile = this.resolveDatabaseFile();
    if (databaseFile === null) {
      this.logger.warn({ type: this.dataSource.options.type }, '当前数据库类型不支持文件备份');
      return null;
    }

    if (!(await this.exists(databaseFile))) {
      this.logger.warn({ databaseFile }, '数据库文件不存在，跳过备份');
      return null;
    }

    const backupPath = buildBackupPath(databaseFile, now);
    try {
      await this.copyDatabase(databaseFile, backupPath);
    } catch (error) {
      this.logger.error({ databaseFile, backupPath, err: error }, '数据库备份失败');
      throw new DomainError(
        MAINTENANCE_ERROR.BACKUP_FAILED,
        'Error creating database backup',
        { backupPath },
        error,
      );
    }
    this.logger.info({ backupPath }, '数据库备份已创建');
    return backupPath;
  }

  /** 已连接时使用 better-sqlite3 在线备份，未连接时直接复制文件 */
  private async copyDatabase(databaseFile: string, backupPath: string): Promise<void> {
    const driver = this.dataSource.driver;
    if (this.dataSource.isInitialized && driver instanceof BetterSqlite3Driver) {
      const connection: Database.Database = driver.databaseConnection;
      await connection.backup(backupPath);
      return;
    }
    await copyFile(databaseFile, backupPath);
  }

  private resolveDatabaseFile(): string | null {
    const options = this.dataSource.options;
    if (options.type !== 'better-sqlite3') return null;
    const database = options.database;
    if (typeof database !== 'string' || database === IN_MEMORY_DATABASE) return null;
    return database;
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await access(file);
      return true;
    } catch {
      return false;
    }
  }
}
