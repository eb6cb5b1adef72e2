// src/types/models/user.types.ts

/**
 * 用户角色
 * 与 users.role 列的 CHECK 约束（valid_role）保持一致
 */
export enum UserRole {
  STUDENT = 'student',
  TEACHER = 'teacher',
  ADMIN = 'admin',
}

/** 合法角色列表（供校验与约束表达式使用） */
export const USER_ROLES: readonly UserRole[] = Object.values(UserRole);
