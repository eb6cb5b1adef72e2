// src/cli/cli-context.ts

import { NestFactory } from '@nestjs/core';
import { DatabaseHealthUsecase } from '@usecases/maintenance/database-health.usecase';
import type {
  DatabaseHealthReport,
  MigrateResult,
  ResetResult,
} from '@usecases/maintenance/maintenance.types';
import { MigrateDatabaseUsecase } from '@usecases/maintenance/migrate-database.usecase';
import { ResetDatabaseUsecase } from '@usecases/maintenance/reset-database.usecase';
import { Logger } from 'nestjs-pino';
import { CliModule } from './cli.module';

/** 命令行可用的数据维护操作 */
export interface MaintenanceCommands {
  migrate(): Promise<MigrateResult>;
  reset(confirmation: string): Promise<ResetResult>;
  health(): Promise<DatabaseHealthReport>;
  /** 关闭 Nest 上下文与数据库连接 */
  close(): Promise<void>;
}

/**
 * 创建 Nest 独立应用上下文并取出数据维护用例
 */
export async function createCliContext(): Promise<MaintenanceCommands> {
  const app = await NestFactory.createApplicationContext(CliModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  const migrateDatabase = app.get(MigrateDatabaseUsecase);
  const resetDatabase = app.get(ResetDatabaseUsecase);
  const databaseHealth = app.get(DatabaseHealthUsecase);

  return {
    migrate: () => migrateDatabase.execute(),
    reset: (confirmation) => resetDatabase.execute({ confirmation }),
    health: () => databaseHealth.report(),
    close: () => app.close(),
  };
}
