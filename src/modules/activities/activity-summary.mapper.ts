// src/modules/activities/activity-summary.mapper.ts
import type {
  ActivityFillStatus,
  ActivityParticipantView,
  ActivitySummary,
} from '@app-types/models/activity.types';
import { availableSpots, isFull } from '@core/activity/policy/capacity.policy';
import type { ActivityEntity } from './activity.entity';

/**
 * 活动实体 → 参与者视图（需预先加载 enrollments.user）
 */
export function toParticipantViews(activity: ActivityEntity): ActivityParticipantView[] {
  return (activity.enrollments ?? []).flatMap((enrollment) =>
    enrollment.user
      ? [
          {
            email: enrollment.user.email,
            name: enrollment.user.name,
            role: enrollment.user.role,
            enrolledAt: enrollment.enrolledAt,
          },
        ]
      : [],
  );
}

/**
 * 活动实体 → 活动概要（派生 availableSpots / isFull）
 */
export function toActivitySummary(activity: ActivityEntity): ActivitySummary {
  const participants = toParticipantViews(activity);
  return {
    id: activity.id,
    name: activity.name,
    description: activity.description,
    schedule: activity.schedule,
    maxParticipants: activity.maxParticipants,
    participants,
    availableSpots: availableSpots(activity.maxParticipants, participants.length),
    isFull: isFull(activity.maxParticipants, participants.length),
  };
}

/** 活动实体 → 容量状态 */
export function toFillStatus(activity: ActivityEntity): ActivityFillStatus {
  const count = activity.enrollments?.length ?? 0;
  return {
    name: activity.name,
    participants: count,
    maxParticipants: activity.maxParticipants,
    availableSpots: availableSpots(activity.maxParticipants, count),
    isFull: isFull(activity.maxParticipants, count),
  };
}
