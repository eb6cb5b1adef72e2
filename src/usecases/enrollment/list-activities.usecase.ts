// src/usecases/enrollment/list-activities.usecase.ts

import type { ActivitySummary } from '@app-types/models/activity.types';
import { translateStorageError } from '@core/database/storage-error.translator';
import { ActivitiesService } from '@modules/activities/activities.service';
import { toActivitySummary } from '@modules/activities/activity-summary.mapper';
import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

/**
 * 活动列表用例
 * 返回全部活动及其参与者、剩余名额与是否已满
 */
@Injectable()
export class ListActivitiesUsecase {
  constructor(
    private readonly activitiesService: ActivitiesService,
    @InjectPinoLogger(ListActivitiesUsecase.name)
    private readonly logger: PinoLogger,
  ) {}

  async execute(): Promise<ActivitySummary[]> {
    try {
      const activities = await this.activitiesService.listAll();
      return activities.map(toActivitySummary);
    } catch (error) {
      this.logger.error({ err: error }, '读取活动列表失败');
      throw translateStorageError(error, 'Error retrieving activities from database');
    }
  }
}
