// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

const serverConfig: ConfigFactory = () => ({
  server: {
    host: process.env.APP_HOST || '127.0.0.1',
    port: parseInt(process.env.APP_PORT || '8000', 10),
    // 前端静态文件目录（相对于项目根目录），挂载在 /static 下
    staticDir: process.env.APP_STATIC_DIR || 'static',
  },
});

export default serverConfig;
