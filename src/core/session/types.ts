/**
 * Session Manager Types
 *
 * Request shapes, configuration and injectable dependencies of the
 * SessionManager.
 */

import type { ReviewEventSink } from '../events';
import type { Logger } from '../logging';
import type { Algorithm, Difficulty } from '../models';
import type { ReviewScheduler } from '../scheduling';
import type { RetryPolicy } from '../scheduling/retry';
import type { SessionStore } from '../stores';

export interface StartSessionOptions {
  /** Algorithm for items reviewed in this session that have no schedule yet */
  algorithm?: Algorithm;
}

/**
 * One review submitted inside a session.
 */
export interface SessionReviewInput {
  itemId: string;
  difficulty: Difficulty;
  /** Overrides the item's current algorithm for this review */
  algorithm?: Algorithm;
  timeTakenSeconds?: number;
  confidence?: number;
  /** Review time; defaults to the manager clock */
  reviewedAt?: Date;
}

export interface SessionManagerConfig {
  /** Session algorithm when startSession is given none */
  defaultAlgorithm: Algorithm;
  /** Backoff for transient session store failures */
  retry: RetryPolicy;
}

export interface SessionManagerDependencies {
  scheduler: ReviewScheduler;
  sessions: SessionStore;
  events?: ReviewEventSink;
  logger?: Logger;
  clock?: () => Date;
}
