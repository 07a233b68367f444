/**
 * Scheduling Module
 *
 * The ReviewScheduler plus the building blocks it is made of.
 */

export { ReviewScheduler, DEFAULT_DUE_LIMIT } from './scheduler';
export { KeyedMutex } from './keyed-mutex';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './retry';
export type { RetryPolicy } from './retry';
export { overdueDays, priorityScore, toReviewSchedule, compareByPriority } from './priority';
export { reviewWindow } from './review-window';
export { parseAlgorithm, parseMetadata } from './validation';
export type {
  ReviewMetadata,
  ScheduleReviewRequest,
  InitialScheduleRequest,
  InitialScheduleResult,
  ReviewSchedulerConfig,
  ReviewSchedulerDependencies,
} from './types';
