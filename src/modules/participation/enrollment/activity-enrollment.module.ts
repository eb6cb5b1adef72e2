// src/modules/participation/enrollment/activity-enrollment.module.ts

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ActivityEnrollmentService } from './activity-enrollment.service';
import { ActivityParticipantEntity } from './activity-participant.entity';

/**
 * 活动报名模块
 */
@Module({
  imports: [TypeOrmModule.forFeature([ActivityParticipantEntity])],
  providers: [ActivityEnrollmentService],
  exports: [ActivityEnrollmentService, TypeOrmModule],
})
export class ActivityEnrollmentModule {}
