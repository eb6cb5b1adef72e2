// src/modules/activities/activities.module.ts

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ActivitiesService } from './activities.service';
import { ActivityEntity } from './activity.entity';

/**
 * 活动模块
 */
@Module({
  imports: [TypeOrmModule.forFeature([ActivityEntity])],
  providers: [ActivitiesService],
  exports: [ActivitiesService, TypeOrmModule],
})
export class ActivitiesModule {}
