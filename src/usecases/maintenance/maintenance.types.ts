// src/usecases/maintenance/maintenance.types.ts
import type { ActivityFillStatus } from '@app-types/models/activity.types';

/** 初始化数据结果 */
export interface BootstrapResult {
  /** 是否实际写入（活动表非空时为 false） */
  readonly seeded: boolean;
  readonly activitiesCreated: number;
  readonly usersCreated: number;
  readonly enrollmentsCreated: number;
}

/** 补齐 created_at 的结果 */
export interface HealResult {
  readonly healed: number;
}

/** 迁移结果：空库写入初始数据，否则修复旧数据 */
export interface MigrateResult {
  readonly backupPath: string | null;
  readonly outcome:
    | { readonly kind: 'seeded'; readonly bootstrap: BootstrapResult }
    | { readonly kind: 'healed'; readonly healed: number };
}

/** 重置结果 */
export interface ResetResult {
  readonly backupPath: string | null;
  readonly bootstrap: BootstrapResult;
}

/** 数据库健康报告 */
export interface DatabaseHealthReport {
  readonly activities: number;
  readonly users: number;
  readonly totalEnrollments: number;
  readonly details: ReadonlyArray<ActivityFillStatus>;
}
