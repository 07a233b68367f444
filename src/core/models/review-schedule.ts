/**
 * ReviewSchedule Domain Types
 *
 * A ReviewSchedule is the single active scheduling record for one item and
 * one user. Rescheduling replaces it; it is never duplicated. When the owning
 * item is deleted the schedule is archived rather than removed so history
 * keeps pointing at something.
 */

import type { MemoryStrength } from './memory-strength';
import type { Algorithm } from './review';

/**
 * - 'active': participates in due-item queries
 * - 'archived': owning item was deleted; kept for audit
 */
export type ScheduleStatus = 'active' | 'archived';

/**
 * The persisted part of a schedule.
 */
export interface StoredReviewSchedule {
  itemId: string;
  userId: string;

  /** When the item is next due */
  scheduledDate: Date;

  /** Algorithm that will be applied on the next review */
  algorithm: Algorithm;

  /** Memorisation state embedded in the schedule */
  strength: MemoryStrength;

  status: ScheduleStatus;

  /**
   * Optimistic concurrency counter. Incremented on every write; a commit
   * carrying a stale version is rejected by the store.
   */
  version: number;

  /** Start of the acceptable review window around scheduledDate */
  earliestDate: Date;

  /** End of the acceptable review window around scheduledDate */
  latestDate: Date;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * A schedule as returned to callers, with the fields derived relative to a
 * reference time.
 */
export interface ReviewSchedule extends StoredReviewSchedule {
  /** Whole days past scheduledDate, never negative */
  overdueDays: number;

  /** overdueDays * 1.0 + (1 - retentionRate) * 10.0 */
  priorityScore: number;

  /** Mirrors strength.isLeech so callers can act without digging */
  isLeech: boolean;
}
