// src/types/models/activity.types.ts
import { UserRole } from './user.types';

/**
 * 活动参与者视图（只读）
 */
export interface ActivityParticipantView {
  readonly email: string;
  readonly name: string | null;
  readonly role: UserRole;
  readonly enrolledAt: Date;
}

/**
 * 活动概要（含派生容量字段，不落库）
 */
export interface ActivitySummary {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly participants: ReadonlyArray<ActivityParticipantView>;
  readonly availableSpots: number;
  readonly isFull: boolean;
}

/**
 * 对外 HTTP 合约中的单个活动结构（字段名保持 snake_case）
 */
export interface ActivityListingItem {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
  available_spots: number;
  is_full: boolean;
}

/** 活动名称 → 活动结构 */
export type ActivityListing = Record<string, ActivityListingItem>;

/**
 * 单个活动的容量状态（健康报告使用）
 */
export interface ActivityFillStatus {
  readonly name: string;
  readonly participants: number;
  readonly maxParticipants: number;
  readonly availableSpots: number;
  readonly isFull: boolean;
}
