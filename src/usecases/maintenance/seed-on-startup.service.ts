// src/usecases/maintenance/seed-on-startup.service.ts

import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { BootstrapSeedDataUsecase } from './bootstrap-seed-data.usecase';

/**
 * 应用启动时写入初始数据（database.seedOnStartup 开启时）
 * 失败只记录日志，不影响服务启动
 */
@Injectable()
export class SeedOnStartupService implements OnApplicationBootstrap {
  constructor(
    private readonly configService: ConfigService,
    private readonly bootstrapSeedData: BootstrapSeedDataUsecase,
    @InjectPinoLogger(SeedOnStartupService.name)
    private readonly logger: PinoLogger,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.configService.get<boolean>('database.seedOnStartup', true)) return;
    try {
      await this.bootstrapSeedData.execute();
    } catch (error) {
      this.logger.error({ err: error }, '启动时写入初始数据失败，服务继续启动');
    }
  }
}
