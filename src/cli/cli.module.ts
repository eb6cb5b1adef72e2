// src/cli/cli.module.ts

import { AppConfigModule } from '@core/config/config.module';
import { createMaintenanceDatabaseConfig } from '@core/database/database.module';
import { LoggerModule } from '@core/logger/logger.module';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MaintenanceUsecasesModule } from '@usecases/maintenance/maintenance-usecases.module';

/**
 * 命令行上下文模块
 * 只加载配置、日志、数据库与数据维护用例，不启动 HTTP / GraphQL
 * 数据库连接不随 DB_SYNCHRONIZE 同步表结构，备份总在第一次写入之前
 */
@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createMaintenanceDatabaseConfig,
    }),
    MaintenanceUsecasesModule,
  ],
})
export class CliModule {}
