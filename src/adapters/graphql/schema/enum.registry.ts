// src/adapters/graphql/schema/enum.registry.ts

import { registerEnumType } from '@nestjs/graphql';

// 导入所有需要注册的枚举类型（仅依赖 @app-types）
import { UserRole } from '@app-types/models/user.types';

/**
 * 枚举注册配置接口
 */
interface EnumConfig {
  /** 枚举类型 */
  enumType: object;
  /** GraphQL 名称 */
  name: string;
  /** 描述 */
  description: string;
  /** 值映射 */
  valuesMap: Record<string, { description: string }>;
}

/**
 * 枚举注册配置映射表
 */
const ENUM_CONFIGS: Record<string, EnumConfig> = {
  USER_ROLE: {
    enumType: UserRole,
    name: 'UserRole',
    description: '用户角色枚举',
    valuesMap: {
      STUDENT: { description: '学生' },
      TEACHER: { description: '教师' },
      ADMIN: { description: '管理员' },
    },
  },
};

/** 预期注册的枚举名称 */
export const EXPECTED_ENUMS: ReadonlyArray<string> = Object.values(ENUM_CONFIGS).map(
  (config) => config.name,
);

/**
 * 注册所有 GraphQL 枚举类型
 */
export function registerEnums(): string[] {
  const registeredEnums: string[] = [];

  Object.values(ENUM_CONFIGS).forEach((config) => {
    registerEnumType(config.enumType, {
      name: config.name,
      description: config.description,
      valuesMap: config.valuesMap,
    });
    registeredEnums.push(config.name);
  });

  const missingEnums = EXPECTED_ENUMS.filter((enumName) => !registeredEnums.includes(enumName));
  if (missingEnums.length > 0) {
    throw new Error(`GraphQL 枚举注册失败：以下枚举未成功注册 - ${missingEnums.join(', ')}`);
  }
  return registeredEnums;
}
