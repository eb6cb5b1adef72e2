// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';

const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode >= 400 && statusCode < 500) {
    const forwardedRaw = req.headers?.['x-forwarded-for'];
    const xForwardedFor = Array.isArray(forwardedRaw) ? forwardedRaw.join(',') : forwardedRaw;
    const userAgentRaw = req.headers?.['user-agent'];
    const userAgent = Array.isArray(userAgentRaw) ? userAgentRaw.join(',') : userAgentRaw;

    const remoteAddress = req.socket?.remoteAddress ?? null;
    const method = req.method ?? null;
    const url = req.url ?? null;
    // express 在 IncomingMessage 上挂载 originalUrl
    const originalUrl =
      'originalUrl' in req && typeof req.originalUrl === 'string' ? req.originalUrl : url;

    return {
      remoteAddress,
      xForwardedFor: xForwardedFor ?? null,
      method,
      url,
      originalUrl,
      userAgent: userAgent ?? null,
    };
  }
  return {};
};

const loggerConfig: ConfigFactory = () => {
  const env = process.env.NODE_ENV || 'development';
  const isProd = env === 'production';
  const isTest = env === 'test';
  const logPath = process.env.LOG_PATH || './logs';
  const defaultLevel = isProd ? 'info' : isTest ? 'silent' : 'debug';

  return {
    logger: {
      level: process.env.LOG_LEVEL || defaultLevel,
      redactFields: ['req.headers.authorization', 'req.headers.cookie'],
      file: {
        enabled: isProd,
        path: logPath,
      },
      // 不自动展开 req/res，但允许你手动 logger.debug({ req, res }, ...)
      customProps: customPropsFor4xx,
      // 自定义日志级别函数
      customLogLevel: (req: IncomingMessage, res: ServerResponse, err?: Error) => {
        // 忽略 favicon 请求
        if (req.url === '/favicon.ico') return 'silent';

        // 正常的日志记录逻辑
        if (res.statusCode >= 500 || err) return 'error';
        if (res.statusCode >= 400) return 'warn';

        // 静态资源、根路径跳转与健康检查不记录
        const url = req.url ?? '';
        if (url === '/' || url.startsWith('/static/') || url === '/health') return 'silent';

        // 报名 / 退出等写操作与 GraphQL 请求正常记录
        if (req.method === 'POST' || req.method === 'DELETE') return 'info';
        return 'debug';
      },
      // 动态生成 transport 配置；测试环境不启用 transport，避免遗留 worker 线程
      transport: isTest
        ? undefined
        : !isProd
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:dd HH:MM:ss',
              messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
              ignore: 'hostname,pid,req,context',
              // 简洁输出, 完全屏蔽上下文的输出
              // hideObject: true,
            },
          }
        : {
            targets: [
              {
                target: 'pino/file',
                options: {
                  destination: `${logPath}/app.log`,
                  mkdir: true,
                },
                level: 'info',
              },
              {
                target: 'pino/file',
                options: {
                  destination: `${logPath}/error.log`,
                  mkdir: true,
                },
                level: 'error',
              },
            ],
          },
    },
  };
};

export default loggerConfig;
