// src/usecases/maintenance/heal-activity-timestamps.usecase.ts

import { ActivitiesService } from '@modules/activities/activities.service';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { HealResult } from './maintenance.types';

/**
 * 修复旧数据：为 created_at 为空的活动补齐创建时间
 * 全部补齐后一次提交；没有缺失时不写入
 */
@Injectable()
export class HealActivityTimestampsUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly activitiesService: ActivitiesService,
    @InjectPinoLogger(HealActivityTimestampsUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * @param now 补齐使用的时间
   */
  async execute(now: Date = new Date()): Promise<HealResult> {
    const missing = await this.activitiesService.findMissingCreatedAt();
    if (missing.length === 0) return { healed: 0 };

    const ids = missing.map((activity) => activity.id);
    const healed = await this.dataSource.transaction((manager) =>
      this.activitiesService.backfillCreatedAt(ids, now, manager),
    );
    this.logger.info({ healed, ids }, '已补齐活动创建时间');
    return { healed };
  }
}
