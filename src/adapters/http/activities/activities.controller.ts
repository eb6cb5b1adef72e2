// src/adapters/http/activities/activities.controller.ts
import type { ActivityListing } from '@app-types/models/activity.types';
import { ValidateInput } from '@core/common/errors';
import { Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import type { EnrollmentOutcome } from '@usecases/enrollment/enrollment.types';
import { ListActivitiesUsecase } from '@usecases/enrollment/list-activities.usecase';
import { SignupForActivityUsecase } from '@usecases/enrollment/signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from '@usecases/enrollment/unregister-from-activity.usecase';
import { toActivityListing } from './activity-listing.mapper';
import { EmailQuery } from './dto/email.query';

/**
 * 课外活动 REST 接口
 */
@Controller('activities')
export class ActivitiesController {
  constructor(
    private readonly listActivitiesUsecase: ListActivitiesUsecase,
    private readonly signupForActivityUsecase: SignupForActivityUsecase,
    private readonly unregisterFromActivityUsecase: UnregisterFromActivityUsecase,
  ) {}

  @Get()
  async list(): Promise<ActivityListing> {
    const summaries = await this.listActivitiesUsecase.execute();
    return toActivityListing(summaries);
  }

  @Post(':activityName/signup')
  @HttpCode(HttpStatus.OK)
  @ValidateInput()
  async signup(
    @Param('activityName') activityName: string,
    @Query() query: EmailQuery,
  ): Promise<EnrollmentOutcome> {
    return await this.signupForActivityUsecase.execute({ activityName, email: query.email });
  }

  @Delete(':activityName/unregister')
  @ValidateInput()
  async unregister(
    @Param('activityName') activityName: string,
    @Query() query: EmailQuery,
  ): Promise<EnrollmentOutcome> {
    return await this.unregisterFromActivityUsecase.execute({ activityName, email: query.email });
  }
}
