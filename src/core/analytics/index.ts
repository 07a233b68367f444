/**
 * Analytics Module
 *
 * Read-only statistics over review history.
 */

export { StatisticsAggregator, resolveWindow } from './statistics-aggregator';
export type { StatisticsAggregatorDependencies } from './statistics-aggregator';
export { calculateStreaks } from './streaks';
export type { StreakSummary } from './streaks';
export { reviewsByHour, bestReviewHour, DEFAULT_REVIEW_HOUR } from './review-hours';
export type { HourBucket } from './review-hours';
export type { LearningStatistics, StatisticsWindow, StatisticsPreset, StatisticsRange } from './types';
