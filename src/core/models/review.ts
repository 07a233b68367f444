/**
 * Review Vocabulary
 *
 * The two enumerations every other module speaks: how hard a review felt,
 * and which algorithm schedules an item. Both are string literal unions with
 * a matching readonly tuple for runtime validation.
 */

/**
 * User rating for a single review:
 * - 'AGAIN': complete failure to recall
 * - 'HARD': recalled with significant difficulty
 * - 'GOOD': recalled with normal effort
 * - 'EASY': recalled effortlessly
 */
export const DIFFICULTIES = ['AGAIN', 'HARD', 'GOOD', 'EASY'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * Scheduling algorithms. CUSTOM is served by a caller-supplied strategy
 * (or the built-in interval-doubling fallback).
 */
export const ALGORITHMS = ['SM2', 'ANKI', 'LEITNER', 'CUSTOM'] as const;
export type Algorithm = (typeof ALGORITHMS)[number];

/**
 * GOOD and EASY count as successful recall for statistics and streaks.
 */
export function isSuccessfulReview(difficulty: Difficulty): boolean {
  return difficulty === 'GOOD' || difficulty === 'EASY';
}
