/**
 * Commander argument parsers. Each throws commander's InvalidArgumentError,
 * which commander reports against the offending option.
 */

import { InvalidArgumentError } from 'commander';

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
  }
  return parsed;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got '${value}'.`);
  }
  return parsed;
}

/**
 * Accepts anything Date can parse, e.g. 2024-03-01 or 2024-03-01T09:30:00Z.
 */
export function parseDateOption(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError(`Expected a date, got '${value}'.`);
  }
  return parsed;
}
