/**
 * ReviewHistory Domain Types
 *
 * One immutable record per review event. History is append-only and outlives
 * sessions; a session only refers to its records through sessionId.
 */

import type { Algorithm, Difficulty } from './review';

export interface ReviewHistoryRecord {
  /** Unique identifier ('rh_<uuid>'); re-appending the same id is a no-op */
  id: string;
  itemId: string;
  userId: string;

  /** Session the review was recorded in, if any */
  sessionId: string | null;

  difficulty: Difficulty;

  /** Algorithm that produced the new state */
  algorithm: Algorithm;

  /** Seconds the user spent on the review, when reported */
  timeTakenSeconds: number | null;

  /** Self-reported confidence (0-1), when reported */
  confidence: number | null;

  /** Interval before and after the review, for interval-change reporting */
  intervalDaysBefore: number;
  intervalDaysAfter: number;

  reviewedAt: Date;
}
