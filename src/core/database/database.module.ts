// src/core/database/database.module.ts

import { DEFAULT_SQLITE_FILE } from '@core/config/database.config';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { EntityConstraintSubscriber } from './entity-constraint.subscriber';

/**
 * 数据库配置工厂函数
 * 按 database.type 生成 better-sqlite3 或 mysql 的 TypeORM 配置
 * @param config 配置服务实例
 * @returns TypeORM 配置选项
 */
export const createDatabaseConfig = (config: ConfigService): TypeOrmModuleOptions => {
  const shared = {
    synchronize: config.get<boolean>('database.synchronize', false),
    logging: config.get<boolean>('database.logging', false),
    // 自动加载 entities
    autoLoadEntities: true,
    // 注册 subscriber：存储边界的字段规则
    subscribers: [EntityConstraintSubscriber],
  };

  if (config.get<string>('database.type') === 'mysql') {
    return {
      ...shared,
      type: 'mysql',
      host: config.get<string>('database.host'),
      port: config.get<number>('database.port'),
      username: config.get<string>('database.username'),
      password: config.get<string>('database.password'),
      database: config.get<string>('database.name'),
      timezone: config.get<string>('database.timezone'),
      charset: config.get<string>('database.charset'),
      extra: config.get<Record<string, unknown>>('database.extra'),
    };
  }

  return {
    ...shared,
    type: 'better-sqlite3',
    database: config.get<string>('database.name', DEFAULT_SQLITE_FILE),
  };
};

/**
 * 命令行维护上下文的 TypeORM 配置
 * 连接时不同步表结构，迁移 / 重置用例在备份之后显式同步
 * @param config 配置服务实例
 */
export const createMaintenanceDatabaseConfig = (config: ConfigService): TypeOrmModuleOptions => ({
  ...createDatabaseConfig(config),
  synchronize: false,
});

/**
 * 数据库模块
 * 封装 TypeORM 配置和初始化逻辑
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createDatabaseConfig,
    }),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
