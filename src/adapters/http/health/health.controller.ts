// src/adapters/http/health/health.controller.ts
import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { DatabaseHealthUsecase } from '@usecases/maintenance/database-health.usecase';

/**
 * 健康检查：验证数据库连通性
 */
@Controller('health')
export class HealthController {
  constructor(private readonly databaseHealth: DatabaseHealthUsecase) {}

  @Get()
  async check(): Promise<{ status: 'healthy'; database: 'connected' }> {
    if (!(await this.databaseHealth.probe())) {
      throw new ServiceUnavailableException('Database connection failed');
    }
    return { status: 'healthy', database: 'connected' };
  }
}
