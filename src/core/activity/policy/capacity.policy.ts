// 文件位置：src/core/activity/policy/capacity.policy.ts
// 容量相关的派生值：只依赖当前参与人数与容量上限，不落库

export function availableSpots(maxParticipants: number, participantCount: number): number {
  return maxParticipants - participantCount;
}

export function isFull(maxParticipants: number, participantCount: number): boolean {
  return participantCount >= maxParticipants;
}

/**
 * 健康报告中的容量描述：满员显示 FULL，否则显示剩余名额
 */
export function describeFillStatus(maxParticipants: number, participantCount: number): string {
  const spots = availableSpots(maxParticipants, participantCount);
  return spots <= 0 ? 'FULL' : `${spots} spots left`;
}
