/**
 * Session Module
 *
 * @example
 * ```typescript
 * import { SessionManager } from '@/core/session';
 * ```
 */

export { SessionManager } from './session-manager';
export { addReview, emptyAggregates, emptyDifficultyCounts, summarize } from './aggregates';
export type { RecordedReview } from './aggregates';
export type {
  StartSessionOptions,
  SessionReviewInput,
  SessionManagerConfig,
  SessionManagerDependencies,
} from './types';
