/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the algorithms, the scheduler, the
 * session manager and the stores.
 *
 * @example
 * ```typescript
 * import {
 *   createMemoryStrength,
 *   type MemoryStrength,
 *   type ReviewSchedule,
 * } from '@/core/models';
 * ```
 */

// Review vocabulary
export { DIFFICULTIES, ALGORITHMS, isSuccessfulReview } from './review';
export type { Difficulty, Algorithm } from './review';

// MemoryStrength - per item and user memorisation state
export {
  MIN_EASE_FACTOR,
  DEFAULT_EASE_FACTOR,
  MIN_INTERVAL_DAYS,
  DEFAULT_MEMORY_STRENGTH,
  createMemoryStrength,
  lowerEase,
  clampInterval,
} from './memory-strength';
export type { MemoryStrength, MemoryStrengthInput } from './memory-strength';

// MemoryItem - reviewable content
export type { MemoryItem } from './memory-item';

// ReviewSchedule - one active schedule per item and user
export type { ScheduleStatus, StoredReviewSchedule, ReviewSchedule } from './review-schedule';

// ReviewHistory - append-only review log
export type { ReviewHistoryRecord } from './review-history';

// ReviewSession - bounded runs of reviews
export type {
  SessionStatus,
  DifficultyCounts,
  SessionAggregates,
  ReviewSessionSummary,
  ReviewSession,
} from './review-session';
