// src/adapters/graphql/graphql-adapter.module.ts

import { Module } from '@nestjs/common';
import { EnrollmentUsecasesModule } from '@usecases/enrollment/enrollment-usecases.module';

// Resolvers
import { ActivitiesResolver } from './activities/activities.resolver';

/**
 * GraphQL 适配器模块
 * 统一管理所有 GraphQL Resolvers，遵循适配器层架构原则
 */
@Module({
  imports: [EnrollmentUsecasesModule],
  providers: [ActivitiesResolver],
})
export class GraphQLAdapterModule {}
