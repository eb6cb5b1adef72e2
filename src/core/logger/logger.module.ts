// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';
import { LevelWithSilent } from 'pino';

type CustomLogLevel = (req: IncomingMessage, res: ServerResponse, err?: Error) => LevelWithSilent;
type CustomProps = (req: IncomingMessage, res: ServerResponse) => Record<string, unknown>;

@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const level = configService.get<string>('logger.level', 'info');
        return {
          pinoHttp: {
            level,
            transport: configService.get('logger.transport'),
            redact: configService.get<string[]>('logger.redactFields', []),
            customProps: configService.get<CustomProps>('logger.customProps'),
            customLogLevel: configService.get<CustomLogLevel>('logger.customLogLevel'),
            // silent 时完全关闭请求日志
            autoLogging: level !== 'silent',
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
