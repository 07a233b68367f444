/**
 * Due-item priority.
 *
 *   priorityScore = overdueDays * 1.0 + (1 - retentionRate) * 10.0
 *
 * Items long overdue, and items we expect to have forgotten, come first.
 */

import { wholeDaysBetween } from '../time';
import type { ReviewSchedule, StoredReviewSchedule } from '../models';

const OVERDUE_WEIGHT = 1.0;
const FORGETTING_WEIGHT = 10.0;

/** Whole days past the due date, never negative */
export function overdueDays(scheduledDate: Date, asOf: Date): number {
  return Math.max(0, wholeDaysBetween(scheduledDate, asOf));
}

export function priorityScore(overdue: number, retentionRate: number): number {
  return overdue * OVERDUE_WEIGHT + (1 - retentionRate) * FORGETTING_WEIGHT;
}

/**
 * Adds the fields derived relative to `asOf`.
 */
export function toReviewSchedule(stored: StoredReviewSchedule, asOf: Date): ReviewSchedule {
  const overdue = overdueDays(stored.scheduledDate, asOf);
  return {
    ...stored,
    overdueDays: overdue,
    priorityScore: priorityScore(overdue, stored.strength.retentionRate),
    isLeech: stored.strength.isLeech,
  };
}

/**
 * Total order for due items: priority descending, then oldest due date,
 * then item id.
 */
export function compareByPriority(a: ReviewSchedule, b: ReviewSchedule): number {
  if (a.priorityScore !== b.priorityScore) {
    return b.priorityScore - a.priorityScore;
  }
  const byDate = a.scheduledDate.getTime() - b.scheduledDate.getTime();
  if (byDate !== 0) {
    return byDate;
  }
  if (a.itemId === b.itemId) {
    return 0;
  }
  return a.itemId < b.itemId ? -1 : 1;
}
