// src/core/common/normalize/normalize.helper.ts

/**
 * 邮箱标准化处理
 * 统一的邮箱标准化逻辑：去除首尾空格 + 转小写
 * @param email 原始邮箱地址
 * @returns 标准化后的邮箱地址
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * 活动名称标准化处理：仅去除首尾空格，保留大小写
 * @param name 原始活动名称
 * @returns 标准化后的活动名称
 */
export function normalizeActivityName(name: string): string {
  return name.trim();
}
