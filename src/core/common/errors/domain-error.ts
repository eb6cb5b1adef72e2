// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 报名领域错误码（报名 / 退出活动）
export const ENROLLMENT_ERROR = {
  ACTIVITY_NOT_FOUND: 'ACTIVITY_NOT_FOUND',
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  ALREADY_ENROLLED: 'ALREADY_ENROLLED',
  NOT_ENROLLED: 'NOT_ENROLLED',
} as const;
Object.freeze(ENROLLMENT_ERROR);

// 输入与实体字段校验错误码
export const VALIDATION_ERROR = {
  INVALID_FIELD: 'VALIDATION_ERROR',
} as const;
Object.freeze(VALIDATION_ERROR);

// 存储层错误码：约束冲突与连接/驱动故障
export const STORAGE_ERROR = {
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
  STORAGE_FAILURE: 'STORAGE_ERROR',
} as const;
Object.freeze(STORAGE_ERROR);

// 数据维护错误码（迁移 / 重置 / 备份）
export const MAINTENANCE_ERROR = {
  RESET_NOT_CONFIRMED: 'RESET_NOT_CONFIRMED',
  BACKUP_FAILED: 'BACKUP_FAILED',
} as const;
Object.freeze(MAINTENANCE_ERROR);

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  const candidate = error as { name?: unknown; code?: unknown };
  return candidate.name === 'DomainError' && typeof candidate.code === 'string';
};
