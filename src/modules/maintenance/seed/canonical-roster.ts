// src/modules/maintenance/seed/canonical-roster.ts
import type { CreateActivityInput } from '@modules/activities/activities.service';
import roster from './canonical-roster.data.json';

/** 初始报名关系：邮箱 + 活动名称 */
export interface RosterEnrollment {
  readonly email: string;
  readonly activityName: string;
}

/** 初始数据：9 个活动及其报名关系 */
export interface CanonicalRoster {
  readonly activities: ReadonlyArray<CreateActivityInput>;
  readonly enrollments: ReadonlyArray<RosterEnrollment>;
}

export const CANONICAL_ROSTER: CanonicalRoster = roster;
