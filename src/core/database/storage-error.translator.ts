// src/core/database/storage-error.translator.ts
// 将 TypeORM / 驱动层错误翻译为领域错误，隐藏驱动细节

import { DomainError, isDomainError, STORAGE_ERROR } from '@core/common/errors/domain-error';
import { QueryFailedError } from 'typeorm';

/** MySQL 约束类错误码 */
const MYSQL_CONSTRAINT_CODES: ReadonlySet<string> = new Set([
  'ER_DUP_ENTRY',
  'ER_CHECK_CONSTRAINT_VIOLATED',
  'ER_NO_REFERENCED_ROW_2',
  'ER_ROW_IS_REFERENCED_2',
  'ER_BAD_NULL_ERROR',
]);

/** 从驱动消息中提取约束名的规则（SQLite / MySQL） */
const RULE_PATTERNS: ReadonlyArray<RegExp> = [
  /constraint failed: (.+)$/i,
  /for key '([^']+)'/,
  /Check constraint '([^']+)'/,
  /Column '([^']+)' cannot be null/,
];

function readDriverCode(driverError: unknown): string | undefined {
  if (driverError && typeof driverError === 'object' && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function isConstraintCode(code: string | undefined): code is string {
  if (!code) return false;
  return code.startsWith('SQLITE_CONSTRAINT') || MYSQL_CONSTRAINT_CODES.has(code);
}

/**
 * 提取违反的约束名
 * @returns 约束名；无法识别时回退为驱动错误码
 */
function extractRule(message: string, code: string): string {
  for (const pattern of RULE_PATTERNS) {
    const matched = pattern.exec(message);
    if (matched?.[1]) return matched[1].trim();
  }
  return code;
}

/**
 * 若错误为存储层约束冲突，返回 CONSTRAINT_VIOLATION 领域错误，否则返回 null
 * @param error 捕获到的任意错误
 */
export function toConstraintViolation(error: unknown): DomainError | null {
  if (!(error instanceof QueryFailedError)) return null;
  const code = readDriverCode(error.driverError);
  if (!isConstraintCode(code)) return null;
  const rule = extractRule(error.message, code);
  return new DomainError(
    STORAGE_ERROR.CONSTRAINT_VIOLATION,
    `Data integrity error: ${rule}`,
    { rule },
    error,
  );
}

/**
 * 统一翻译：领域错误原样返回，约束冲突转 CONSTRAINT_VIOLATION，其余一律视为 STORAGE_ERROR
 * @param error 捕获到的任意错误
 * @param fallbackMessage 对调用方展示的通用消息（不包含驱动细节）
 */
export function translateStorageError(error: unknown, fallbackMessage: string): DomainError {
  if (isDomainError(error)) return error;
  const violation = toConstraintViolation(error);
  if (violation) return violation;
  return new DomainError(STORAGE_ERROR.STORAGE_FAILURE, fallbackMessage, undefined, error);
}
