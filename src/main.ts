import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { initGraphQLSchema } from '@src/adapters/graphql/schema/schema.init';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap() {
  // 在 NestFactory.create 之前初始化 GraphQL Schema
  // 确保所有枚举类型在 Nest 应用启动前已注册
  const schemaResult = initGraphQLSchema();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  configureApp(app);

  const configService = app.get<ConfigService>(ConfigService);
  const logger = app.get(Logger);

  // 记录 GraphQL Schema 初始化信息到 Pino 日志
  logger.debug(
    { fingerprint: schemaResult.fingerprint, enumCount: schemaResult.enums.length },
    'GraphQL Schema 已初始化',
  );

  // 从配置服务中获取服务器配置
  const host = configService.get<string>('server.host', '127.0.0.1');
  const port = configService.get<number>('server.port', 8000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`Mergington 活动报名服务在 http://${host}:${port} 上以 ${nodeEnv} 模式启动成功`);
}

bootstrap().catch((error: unknown) => {
  // 日志模块可能尚未就绪，直接输出到 stderr
  // eslint-disable-next-line no-console
  console.error('服务启动失败', error);
  process.exit(1);
});
