// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GraphQLAdapterModule } from './adapters/graphql/graphql-adapter.module';
import { HttpAdapterModule } from './adapters/http/http-adapter.module';
// 须在 LoggerModule 之前加载，使 nestjs-pino 注册其 @InjectPinoLogger 上下文
import { SeedOnStartupService } from './usecases/maintenance/seed-on-startup.service';
import { AllExceptionsFilter } from './core/common/filters/all-exceptions.filter';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { AppGraphQLModule } from './core/graphql/graphql.module';
import { LoggerModule } from './core/logger/logger.module';
import { MaintenanceUsecasesModule } from './usecases/maintenance/maintenance-usecases.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    AppGraphQLModule,
    // REST 接口（活动、备份、健康检查、根路径跳转）
    HttpAdapterModule,
    // GraphQL 适配器模块
    GraphQLAdapterModule,
    // 启动时写入初始数据
    MaintenanceUsecasesModule,
  ],
  providers: [
    SeedOnStartupService,
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule {}
