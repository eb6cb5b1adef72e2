// src/app.setup.ts
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { resolve } from 'path';

/**
 * 应用级配置：Pino 日志与 /static 静态前端
 * main.ts 与 e2e 测试共用
 */
export function configureApp(app: NestExpressApplication): void {
  app.useLogger(app.get(Logger));

  const configService = app.get<ConfigService>(ConfigService);
  const staticDir = configService.get<string>('server.staticDir', 'static');
  app.useStaticAssets(resolve(process.cwd(), staticDir), { prefix: '/static/' });
}
