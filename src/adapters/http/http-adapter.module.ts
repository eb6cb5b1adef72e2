// src/adapters/http/http-adapter.module.ts

import { Module } from '@nestjs/common';
import { EnrollmentUsecasesModule } from '@usecases/enrollment/enrollment-usecases.module';
import { MaintenanceUsecasesModule } from '@usecases/maintenance/maintenance-usecases.module';
import { ActivitiesController } from './activities/activities.controller';
import { AdminController } from './admin/admin.controller';
import { HealthController } from './health/health.controller';
import { RootController } from './root.controller';

/**
 * HTTP 适配器模块
 * REST 控制器只做参数解析与响应整形，业务规则在用例层
 */
@Module({
  imports: [EnrollmentUsecasesModule, MaintenanceUsecasesModule],
  controllers: [RootController, ActivitiesController, AdminController, HealthController],
})
export class HttpAdapterModule {}
