import { addDays } from '../time';

/** Share of the interval allowed on either side of the due date */
const WINDOW_FRACTION = 0.1;

/**
 * Acceptable review window around a due date: 10% of the interval, and at
 * least one day, on either side.
 */
export function reviewWindow(scheduledDate: Date, intervalDays: number): { earliestDate: Date; latestDate: Date } {
  const margin = Math.max(1, Math.floor(intervalDays * WINDOW_FRACTION));
  return {
    earliestDate: addDays(scheduledDate, -margin),
    latestDate: addDays(scheduledDate, margin),
  };
}
