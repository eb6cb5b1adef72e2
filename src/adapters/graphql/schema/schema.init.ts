// src/adapters/graphql/schema/schema.init.ts

import { createHash } from 'crypto';
import { registerEnums } from './enum.registry';

/**
 * 模块内静态标记，确保只初始化一次
 */
let inited = false;

/** Schema 初始化结果 */
export interface SchemaInitResult {
  success: boolean;
  enums: string[];
  fingerprint: string;
  message: string;
}

/**
 * 基于已注册的类型名称生成轻量级指纹，用于 Schema 同步检查
 * @param enums 已注册的枚举名称列表
 */
function generateSchemaFingerprint(enums: string[]): string {
  const typeString = [...enums].sort().join('|');
  return createHash('md5').update(typeString).digest('hex').substring(0, 8);
}

/**
 * 初始化 GraphQL Schema
 * 在 GraphQLModule 生成 schema 之前单点注册所有枚举，重复调用直接忽略
 */
export function initGraphQLSchema(): SchemaInitResult {
  // 热更新、Jest/E2E 测试中可能重复调用
  if (inited) {
    return {
      success: false,
      enums: [],
      fingerprint: '',
      message: 'Schema 已初始化，重复调用已忽略',
    };
  }

  try {
    const enums = registerEnums();
    inited = true;
    return {
      success: true,
      enums,
      fingerprint: generateSchemaFingerprint(enums),
      message: `成功注册 ${enums.length} 个 GraphQL 类型`,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : '未知错误';
    throw new Error(`GraphQL Schema 初始化失败: ${errorMessage}`);
  }
}
