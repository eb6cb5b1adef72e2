// src/core/graphql/graphql.module.ts

import { ApolloServerPluginLandingPageLocalDefault } from '@apollo/server/plugin/landingPage/default';
import { ApolloDriver, ApolloDriverConfig } from '@nestjs/apollo';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GraphQLModule } from '@nestjs/graphql';

/**
 * GraphQL 配置工厂函数
 * @param config 配置服务实例
 * @returns Apollo GraphQL 配置选项
 */
const createGraphQLConfig = (config: ConfigService): ApolloDriverConfig => {
  const introspection = config.get<boolean>('graphql.introspection', false);
  return {
    autoSchemaFile: config.get<string | boolean>('graphql.schemaDestination', true),
    introspection,
    playground: config.get<boolean>('graphql.playground', false),
    sortSchema: config.get<boolean>('graphql.sortSchema', true),
    plugins: introspection ? [ApolloServerPluginLandingPageLocalDefault()] : [],
  };
};

/**
 * GraphQL 模块
 * 封装 GraphQL 配置和初始化逻辑
 */
@Module({
  imports: [
    GraphQLModule.forRootAsync<ApolloDriverConfig>({
      driver: ApolloDriver,
      inject: [ConfigService],
      useFactory: createGraphQLConfig,
    }),
  ],
  exports: [GraphQLModule],
})
export class AppGraphQLModule {}
