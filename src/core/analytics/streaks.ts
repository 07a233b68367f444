/**
 * Day streaks over review timestamps (UTC calendar days).
 */

import { MS_PER_DAY, startOfUtcDay } from '../time';

export interface StreakSummary {
  /** Run of consecutive days ending on the reference day; 0 if that day has no review */
  current: number;
  /** Longest run of consecutive days */
  best: number;
}

export function calculateStreaks(reviewTimes: readonly Date[], asOf: Date): StreakSummary {
  const cutoff = asOf.getTime();
  const days = [
    ...new Set(reviewTimes.filter((time) => time.getTime() <= cutoff).map((time) => startOfUtcDay(time).getTime())),
  ].sort((a, b) => a - b);

  let best = 0;
  let run = 0;
  let previous: number | null = null;
  for (const day of days) {
    run = previous !== null && day - previous === MS_PER_DAY ? run + 1 : 1;
    best = Math.max(best, run);
    previous = day;
  }

  const present = new Set(days);
  let current = 0;
  for (let day = startOfUtcDay(asOf).getTime(); present.has(day); day -= MS_PER_DAY) {
    current += 1;
  }

  return { current, best };
}
