// src/adapters/http/activities/activity-listing.mapper.ts
import type { ActivityListing, ActivitySummary } from '@app-types/models/activity.types';

/**
 * 活动概要列表 → REST 响应（活动名称为键，字段名 snake_case）
 * @param summaries 按 ID 排序的活动概要
 */
export function toActivityListing(summaries: ReadonlyArray<ActivitySummary>): ActivityListing {
  const listing: ActivityListing = {};
  for (const summary of summaries) {
    listing[summary.name] = {
      description: summary.description,
      schedule: summary.schedule,
      max_participants: summary.maxParticipants,
      participants: summary.participants.map((participant) => participant.email),
      available_spots: summary.availableSpots,
      is_full: summary.isFull,
    };
  }
  return listing;
}
