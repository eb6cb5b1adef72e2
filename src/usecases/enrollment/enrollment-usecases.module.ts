// src/usecases/enrollment/enrollment-usecases.module.ts

import { ActivitiesModule } from '@modules/activities/activities.module';
import { ActivityEnrollmentModule } from '@modules/participation/enrollment/activity-enrollment.module';
import { UsersModule } from '@modules/users/users.module';
import { Module } from '@nestjs/common';
import { ListActivitiesUsecase } from './list-activities.usecase';
import { SignupForActivityUsecase } from './signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from './unregister-from-activity.usecase';

/**
 * 报名用例模块
 * 聚合报名 / 退出 / 活动列表用例，供 HTTP 与 GraphQL 适配层使用
 */
@Module({
  imports: [ActivitiesModule, UsersModule, ActivityEnrollmentModule],
  providers: [ListActivitiesUsecase, SignupForActivityUsecase, UnregisterFromActivityUsecase],
  exports: [ListActivitiesUsecase, SignupForActivityUsecase, UnregisterFromActivityUsecase],
})
export class EnrollmentUsecasesModule {}
