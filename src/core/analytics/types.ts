/**
 * Learning Statistics Types
 */

import type { Algorithm, DifficultyCounts } from '../models';

/**
 * Named windows, all ending at the reference time:
 * - 'today': since midnight UTC
 * - 'week': the last 7 days
 * - 'month': the last 30 days
 * - 'all_time': everything
 */
export type StatisticsPreset = 'today' | 'week' | 'month' | 'all_time';

/** Explicit window; `to` defaults to the reference time */
export interface StatisticsRange {
  from?: Date;
  to?: Date;
}

export type StatisticsWindow = StatisticsPreset | StatisticsRange;

export interface LearningStatistics {
  userId: string;

  /** Resolved window; `from` is null for an open start */
  window: { from: Date | null; to: Date };

  /** Reviews in the window */
  reviewedCount: number;

  /** Share of reviews in the window rated GOOD or EASY (0 when empty) */
  retentionRateAvg: number;

  /** Reviews per algorithm in the window */
  algorithmDistribution: Record<Algorithm, number>;

  /** Reviews per rating in the window */
  difficultyDistribution: DifficultyCounts;

  /** Consecutive UTC days with reviews, ending on the reference day */
  streakDays: number;

  /** Longest run of consecutive review days up to the reference time */
  bestStreakDays: number;

  /** Distinct UTC days with reviews in the window */
  activeDays: number;

  /** Sum of reported review times in the window */
  totalTimeSeconds: number;

  /** Mean reported confidence in the window, null when none was reported */
  averageConfidence: number | null;

  /** Reviews per UTC hour in the window, index 0 = 00:00 */
  reviewsByHour: number[];

  /** UTC hour with the best success rate in the window (9 without data) */
  bestReviewHour: number;
}
