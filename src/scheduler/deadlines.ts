import { ReviewTask } from '../config/types';
import { EngineConfig, minutesToMs } from '../config/engine-config';

/** Length of the review window at an escalation level: `sla × backoff^level` */
export function reviewWindowMs(config: Pick<EngineConfig, 'reviewSlaMinutes' | 'backoffFactor'>, level: number): number {
  return Math.round(minutesToMs(config.reviewSlaMinutes) * config.backoffFactor ** level);
}

/** When the reminder at `fraction` of the current window falls due */
export function reminderDueAt(task: Pick<ReviewTask, 'windowStartedAt' | 'deadline'>, fraction: number): number {
  return task.windowStartedAt + fraction * (task.deadline - task.windowStartedAt);
}

/**
 * Highest reminder tier crossed at `now` within the current window that has
 * not been sent yet, or -1. Lower tiers crossed in the same tick are covered
 * by the one notification.
 */
export function dueReminderTier(task: ReviewTask, tiers: readonly number[], now: number): number {
  if (now >= task.deadline) return -1;
  let highest = -1;
  tiers.forEach((fraction, i) => {
    if (now >= reminderDueAt(task, fraction)) highest = i;
  });
  if (highest < 0 || task.remindersSent[highest]) return -1;
  return highest;
}
