/**
 * Date arithmetic shared by the algorithms, the scheduler and the statistics.
 *
 * All calendar maths is done in UTC so results do not depend on the host's
 * timezone.
 */

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Whole days from `from` to `to`, rounded down. Negative when `to` is earlier.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/** Midnight UTC of the day containing `date` */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** 'YYYY-MM-DD' key of the UTC day containing `date` */
export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}
