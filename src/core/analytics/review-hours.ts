/**
 * Hour-of-day performance over review history (UTC hours).
 */

import { isSuccessfulReview, type ReviewHistoryRecord } from '../models';

/** Suggested hour when there is no history to learn from */
export const DEFAULT_REVIEW_HOUR = 9;

export interface HourBucket {
  hour: number;
  reviews: number;
  successes: number;
}

/**
 * Reviews and successes per UTC hour; always 24 buckets, hour 0 first.
 */
export function reviewsByHour(records: readonly ReviewHistoryRecord[]): HourBucket[] {
  const buckets: HourBucket[] = Array.from({ length: 24 }, (_, hour) => ({ hour, reviews: 0, successes: 0 }));
  for (const record of records) {
    const bucket = buckets[record.reviewedAt.getUTCHours()];
    bucket.reviews += 1;
    if (isSuccessfulReview(record.difficulty)) {
      bucket.successes += 1;
    }
  }
  return buckets;
}

/**
 * Hour with the best success rate. Ties go to the earlier hour; with no
 * history the default hour is returned.
 */
export function bestReviewHour(records: readonly ReviewHistoryRecord[]): number {
  let best: { hour: number; rate: number } | null = null;

  for (const bucket of reviewsByHour(records)) {
    if (bucket.reviews === 0) continue;
    const rate = bucket.successes / bucket.reviews;
    if (best === null || rate > best.rate) {
      best = { hour: bucket.hour, rate };
    }
  }

  return best?.hour ?? DEFAULT_REVIEW_HOUR;
}
