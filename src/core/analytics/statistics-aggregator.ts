/**
 * Statistics Aggregator
 *
 * Read-only learning statistics computed from review history. Nothing is
 * cached and nothing is written; a user with no history gets zeroed
 * statistics rather than an error.
 *
 * @example
 * ```typescript
 * const stats = new StatisticsAggregator({ history });
 *
 * const week = await stats.getStatistics('user_1', 'week');
 * console.log(`Retention: ${(week.retentionRateAvg * 100).toFixed(1)}%`);
 * console.log(`Streak: ${week.streakDays} day(s)`);
 * ```
 */

import { InvalidStateError } from '../errors';
import { createLogger, type Logger } from '../logging';
import { isSuccessfulReview, type Algorithm, type ReviewHistoryRecord } from '../models';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../scheduling/retry';
import { requireId } from '../scheduling/validation';
import type { HistoryStore } from '../stores';
import { addDays, startOfUtcDay, utcDayKey } from '../time';
import { emptyDifficultyCounts } from '../session/aggregates';
import { bestReviewHour, reviewsByHour } from './review-hours';
import { calculateStreaks } from './streaks';
import type { LearningStatistics, StatisticsWindow } from './types';

export interface StatisticsAggregatorDependencies {
  history: HistoryStore;
  logger?: Logger;
  clock?: () => Date;
  retry?: RetryPolicy;
}

export class StatisticsAggregator {
  private readonly history: HistoryStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly retry: RetryPolicy;

  constructor(deps: StatisticsAggregatorDependencies) {
    this.history = deps.history;
    this.logger = deps.logger ?? createLogger('StatisticsAggregator');
    this.clock = deps.clock ?? (() => new Date());
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Statistics for the user over `window`, relative to `asOf`.
   *
   * @throws {InvalidStateError} If the window starts after it ends
   */
  async getStatistics(
    userId: string,
    window: StatisticsWindow = 'all_time',
    asOf: Date = this.clock()
  ): Promise<LearningStatistics> {
    requireId('userId', userId);
    const { from, to } = resolveWindow(window, asOf);

    // Streaks look at the whole history, not just the window
    const records = await withRetry(
      'getStatistics',
      () => this.history.findHistory({ userId, to: asOf }),
      this.retry,
      this.logger
    );
    const inWindow = records.filter(
      (record) =>
        (from === null || record.reviewedAt.getTime() >= from.getTime()) &&
        record.reviewedAt.getTime() <= to.getTime()
    );

    const streaks = calculateStreaks(
      records.map((record) => record.reviewedAt),
      asOf
    );

    return {
      userId,
      window: { from, to },
      ...summarizeRecords(inWindow),
      streakDays: streaks.current,
      bestStreakDays: streaks.best,
    };
  }
}

/**
 * Turns a preset or range into concrete bounds.
 */
export function resolveWindow(window: StatisticsWindow, asOf: Date): { from: Date | null; to: Date } {
  if (typeof window === 'string') {
    switch (window) {
      case 'today':
        return { from: startOfUtcDay(asOf), to: asOf };
      case 'week':
        return { from: addDays(asOf, -7), to: asOf };
      case 'month':
        return { from: addDays(asOf, -30), to: asOf };
      case 'all_time':
        return { from: null, to: asOf };
      default:
        throw new InvalidStateError(`Unknown statistics window '${String(window)}'`, { window });
    }
  }

  const from = window.from ?? null;
  const to = window.to ?? asOf;
  if (from !== null && from.getTime() > to.getTime()) {
    throw new InvalidStateError('Statistics window starts after it ends', {
      from: from.toISOString(),
      to: to.toISOString(),
    });
  }
  return { from, to };
}

type WindowFigures = Omit<LearningStatistics, 'userId' | 'window' | 'streakDays' | 'bestStreakDays'>;

function summarizeRecords(records: readonly ReviewHistoryRecord[]): WindowFigures {
  const algorithmDistribution: Record<Algorithm, number> = { SM2: 0, ANKI: 0, LEITNER: 0, CUSTOM: 0 };
  const difficultyDistribution = emptyDifficultyCounts();
  const activeDays = new Set<string>();
  let successes = 0;
  let totalTimeSeconds = 0;
  let confidenceSum = 0;
  let confidenceCount = 0;

  for (const record of records) {
    algorithmDistribution[record.algorithm] += 1;
    difficultyDistribution[record.difficulty] += 1;
    activeDays.add(utcDayKey(record.reviewedAt));
    if (isSuccessfulReview(record.difficulty)) successes += 1;
    if (record.timeTakenSeconds !== null) totalTimeSeconds += record.timeTakenSeconds;
    if (record.confidence !== null) {
      confidenceSum += record.confidence;
      confidenceCount += 1;
    }
  }

  return {
    reviewedCount: records.length,
    retentionRateAvg: records.length === 0 ? 0 : successes / records.length,
    algorithmDistribution,
    difficultyDistribution,
    activeDays: activeDays.size,
    totalTimeSeconds,
    averageConfidence: confidenceCount === 0 ? null : confidenceSum / confidenceCount,
    reviewsByHour: reviewsByHour(records).map((bucket) => bucket.reviews),
    bestReviewHour: bestReviewHour(records),
  };
}
