/**
 * Review Event Types
 *
 * Events the engine announces to the notification layer. Delivery is
 * fire-and-forget: the engine never waits on, or fails because of, a
 * listener.
 */

import type { Algorithm, Difficulty, ReviewSessionSummary } from '../models';

export type ReviewEventType =
  // === Reviews ===
  | 'review.completed'   // A review was recorded and committed
  | 'review.scheduled'   // A schedule got a new due date
  | 'review.due'         // A due-items query returned work
  | 'item.leech'         // An item turned into a leech

  // === Sessions ===
  | 'session.started'
  | 'session.ended';

/**
 * Payload carried by each event type.
 */
export interface ReviewEventPayloads {
  'review.completed': {
    itemId: string;
    userId: string;
    sessionId: string | null;
    difficulty: Difficulty;
    algorithm: Algorithm;
    reviewedAt: Date;
  };
  'review.scheduled': {
    itemId: string;
    userId: string;
    algorithm: Algorithm;
    scheduledDate: Date;
    intervalDays: number;
  };
  'review.due': {
    userId: string;
    asOf: Date;
    itemIds: string[];
  };
  'item.leech': {
    itemId: string;
    userId: string;
    consecutiveFailures: number;
    lapses: number;
  };
  'session.started': {
    sessionId: string;
    userId: string;
    startedAt: Date;
  };
  'session.ended': {
    sessionId: string;
    userId: string;
    summary: ReviewSessionSummary;
  };
}

/**
 * Envelope delivered to listeners.
 */
export interface ReviewEvent<K extends ReviewEventType = ReviewEventType> {
  type: K;
  data: ReviewEventPayloads[K];
  /** When the engine emitted the event */
  timestamp: Date;
}

/**
 * What the engine needs from a notification layer.
 */
export interface ReviewEventSink {
  emit<K extends ReviewEventType>(type: K, data: ReviewEventPayloads[K]): void;
}

export type ReviewEventListener<K extends ReviewEventType = ReviewEventType> = (
  event: ReviewEvent<K>
) => void | Promise<void>;
