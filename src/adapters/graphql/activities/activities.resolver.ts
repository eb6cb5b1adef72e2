// src/adapters/graphql/activities/activities.resolver.ts
import type { ActivitySummary } from '@app-types/models/activity.types';
import { ValidateInput } from '@core/common/errors';
import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ListActivitiesUsecase } from '@usecases/enrollment/list-activities.usecase';
import { SignupForActivityUsecase } from '@usecases/enrollment/signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from '@usecases/enrollment/unregister-from-activity.usecase';
import { ActivityDTO } from './dto/activity.dto';
import { EnrollmentInput } from './dto/enrollment.input';
import { EnrollmentResult } from './dto/enrollment.result';

/**
 * 将活动概要映射为 GraphQL DTO
 * @param summary 活动概要
 */
function toActivityDTO(summary: ActivitySummary): ActivityDTO {
  const dto = new ActivityDTO();
  dto.id = summary.id;
  dto.name = summary.name;
  dto.description = summary.description;
  dto.schedule = summary.schedule;
  dto.maxParticipants = summary.maxParticipants;
  dto.participants = summary.participants.map((participant) => ({ ...participant }));
  dto.availableSpots = summary.availableSpots;
  dto.isFull = summary.isFull;
  return dto;
}

/**
 * 课外活动 GraphQL Resolver
 * 与 REST 接口共用同一组报名用例
 */
@Resolver(() => ActivityDTO)
export class ActivitiesResolver {
  constructor(
    private readonly listActivitiesUsecase: ListActivitiesUsecase,
    private readonly signupForActivityUsecase: SignupForActivityUsecase,
    private readonly unregisterFromActivityUsecase: UnregisterFromActivityUsecase,
  ) {}

  @Query(() => [ActivityDTO], { description: '全部活动及参与者' })
  async activities(): Promise<ActivityDTO[]> {
    const summaries = await this.listActivitiesUsecase.execute();
    return summaries.map(toActivityDTO);
  }

  @Mutation(() => EnrollmentResult, { description: '报名活动' })
  @ValidateInput()
  async signupForActivity(@Args('input') input: EnrollmentInput): Promise<EnrollmentResult> {
    return await this.signupForActivityUsecase.execute({
      activityName: input.activityName,
      email: input.email,
    });
  }

  @Mutation(() => EnrollmentResult, { description: '退出活动' })
  @ValidateInput()
  async unregisterFromActivity(@Args('input') input: EnrollmentInput): Promise<EnrollmentResult> {
    return await this.unregisterFromActivityUsecase.execute({
      activityName: input.activityName,
      email: input.email,
    });
  }
}
