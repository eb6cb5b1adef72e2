// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

/** 支持的存储驱动 */
export type DatabaseDriver = 'better-sqlite3' | 'mysql';

/** 默认的 SQLite 数据库文件 */
export const DEFAULT_SQLITE_FILE = './mergington_activities.db';

const resolveDriver = (raw: string | undefined): DatabaseDriver =>
  raw === 'mysql' ? 'mysql' : 'better-sqlite3';

/**
 * 数据库配置工厂函数
 * DB_TYPE 选择驱动：better-sqlite3（默认，文件或 :memory:）或 mysql
 */
const databaseConfig: ConfigFactory = () => ({
  database: {
    type: resolveDriver(process.env.DB_TYPE),
    // SQLite 为文件路径，MySQL 为库名
    name: process.env.DB_NAME || DEFAULT_SQLITE_FILE,
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USER,
    password: process.env.DB_PASS,
    timezone: process.env.DB_TIMEZONE || 'Z',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    // 启动时若活动表为空则写入初始数据
    seedOnStartup: process.env.DB_SEED_ON_STARTUP !== 'false',
    // MySQL 8.0 特定配置
    charset: 'utf8mb4',
    extra: {
      connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      connectTimeout: 60000,
      waitForConnections: true,
      queueLimit: 0,
    },
  },
});

export default databaseConfig;
