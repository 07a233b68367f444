/**
 * Bulk Scheduler Types
 */

import type { Logger } from '../logging';
import type { Algorithm, MemoryStrengthInput, ReviewSchedule } from '../models';
import type { ErrorCode } from '../errors';
import type { ReviewScheduler } from '../scheduling';

export interface BulkScheduleRequest {
  itemIds: string[];
  userId: string;
  algorithm: Algorithm;
  /** Starting strength for new schedules; validated before any item runs */
  initialStrength?: MemoryStrengthInput;
  /** Days from now until the first review (default 0: due immediately) */
  startOffsetDays?: number;
  /** Spread items over this many days: item i gets `i % n` extra days */
  distributeOverDays?: number;
  /** Stops the batch between items; finished items stay scheduled */
  signal?: AbortSignal;
}

export interface BulkItemFailure {
  itemId: string;
  code: ErrorCode;
  message: string;
}

export interface BulkScheduleResult {
  /** Newly created schedules, in input order */
  scheduled: ReviewSchedule[];
  /** Items that already had an active schedule */
  skipped: string[];
  /** Items that could not be scheduled */
  failed: BulkItemFailure[];
  /** Items never attempted because the batch was cancelled */
  notProcessed: string[];
  cancelled: boolean;
}

export interface BulkSchedulerConfig {
  /** Items in flight at once */
  concurrency: number;
  /** Longest interval `initialStrength` may carry */
  maxIntervalDays: number;
}

export interface BulkSchedulerDependencies {
  scheduler: ReviewScheduler;
  logger?: Logger;
  clock?: () => Date;
}
