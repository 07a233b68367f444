/**
 * Session Manager
 *
 * Groups reviews into bounded sessions:
 *
 *   NOT_STARTED --startSession--> ACTIVE --endSession--> ENDED
 *
 * While ACTIVE, each recorded review is handed to the ReviewScheduler with the
 * session id attached. The store folds it into the session's running
 * aggregates in the same commit as the schedule and history record, and
 * refuses it once the session has ended, so a review is never half applied.
 * Reviews within one session are applied one at a time in submission order.
 *
 * Session writes carry the version they read. Ending a session retries from
 * a fresh read when another process recorded a review in between, so the
 * frozen summary always covers every accepted review. Ending it again
 * returns that same summary.
 *
 * @example
 * ```typescript
 * const manager = new SessionManager({ scheduler, sessions });
 *
 * const session = await manager.startSession('user_1', { algorithm: 'ANKI' });
 * await manager.recordReview(session.id, { itemId: 'mem_1', difficulty: 'GOOD', confidence: 0.9 });
 * const summary = await manager.endSession(session.id);
 * console.log(`${summary.totalReviewed} reviewed, ${summary.accuracyRate * 100}% correct`);
 * ```
 */

import { randomUUID } from 'node:crypto';
import { InvalidStateError, SessionClosedError, SessionNotFoundError } from '../errors';
import type { ReviewEventPayloads, ReviewEventSink, ReviewEventType } from '../events';
import { createLogger, type Logger } from '../logging';
import type { ReviewSchedule, ReviewSession, ReviewSessionSummary } from '../models';
import { KeyedMutex, parseAlgorithm, type ReviewScheduler } from '../scheduling';
import { DEFAULT_RETRY_POLICY, withRetry } from '../scheduling/retry';
import { requireId } from '../scheduling/validation';
import type { SessionStore } from '../stores';
import { addReview, emptyAggregates, summarize } from './aggregates';
import type {
  SessionManagerConfig,
  SessionManagerDependencies,
  SessionReviewInput,
  StartSessionOptions,
} from './types';

const DEFAULT_CONFIG: SessionManagerConfig = {
  defaultAlgorithm: 'SM2',
  retry: DEFAULT_RETRY_POLICY,
};

export class SessionManager {
  private readonly scheduler: ReviewScheduler;
  private readonly sessions: SessionStore;
  private readonly events: ReviewEventSink | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly config: SessionManagerConfig;

  /** Serialises work per session */
  private readonly locks = new KeyedMutex();

  constructor(deps: SessionManagerDependencies, config?: Partial<SessionManagerConfig>) {
    this.scheduler = deps.scheduler;
    this.sessions = deps.sessions;
    this.events = deps.events ?? null;
    this.logger = deps.logger ?? createLogger('SessionManager');
    this.clock = deps.clock ?? (() => new Date());
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Opens a new ACTIVE session for the user.
   */
  async startSession(userId: string, options: StartSessionOptions = {}): Promise<ReviewSession> {
    requireId('userId', userId);
    const algorithm = parseAlgorithm(options.algorithm ?? this.config.defaultAlgorithm);

    const session: ReviewSession = {
      id: `rsess_${randomUUID()}`,
      userId,
      algorithm,
      status: 'active',
      startedAt: this.clock(),
      endedAt: null,
      itemsReviewed: [],
      aggregates: emptyAggregates(),
      summary: null,
      version: 0,
    };

    const created = await withRetry('startSession', () => this.sessions.create(session), this.config.retry, this.logger);

    this.logger.info(`Started session ${created.id} for user '${userId}' (${algorithm})`);
    this.emit('session.started', { sessionId: created.id, userId, startedAt: created.startedAt });
    return created;
  }

  /**
   * Records a review in an ACTIVE session.
   *
   * @returns The item's new schedule
   * @throws {SessionNotFoundError} If the session does not exist
   * @throws {SessionClosedError} If the session has ended
   */
  async recordReview(sessionId: string, review: SessionReviewInput): Promise<ReviewSchedule> {
    requireId('sessionId', sessionId);

    return this.locks.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.status === 'ended') {
        throw new SessionClosedError(sessionId);
      }

      const outcome = {
        difficulty: review.difficulty,
        confidence: review.confidence ?? null,
        timeTakenSeconds: review.timeTakenSeconds ?? null,
      };

      // Re-checked by the store against the committed session row
      return this.scheduler.scheduleReview({
        itemId: review.itemId,
        userId: session.userId,
        difficulty: review.difficulty,
        algorithm: review.algorithm,
        defaultAlgorithm: session.algorithm,
        reviewedAt: review.reviewedAt ?? this.clock(),
        metadata: {
          sessionId,
          timeTakenSeconds: review.timeTakenSeconds,
          confidence: review.confidence,
        },
        updateSession: (current) => ({
          ...current,
          itemsReviewed: [...current.itemsReviewed, review.itemId],
          aggregates: addReview(current.aggregates, outcome),
        }),
      });
    });
  }

  /**
   * Ends the session and returns its summary. Idempotent: once ended, the
   * stored summary is returned unchanged.
   *
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async endSession(sessionId: string): Promise<ReviewSessionSummary> {
    requireId('sessionId', sessionId);

    return this.locks.runExclusive(sessionId, async () => {
      const result = await withRetry(
        'endSession',
        async () => {
          const session = await this.findOrThrow(sessionId);
          if (session.status === 'ended') {
            if (session.summary === null) {
              throw new InvalidStateError(`Session '${sessionId}' ended without a summary`, { sessionId });
            }
            return { session, summary: session.summary, endedNow: false };
          }

          const endedAt = this.clock();
          const summary = summarize(session, endedAt);
          await this.sessions.save({ ...session, status: 'ended', endedAt, summary }, session.version);
          return { session, summary, endedNow: true };
        },
        this.config.retry,
        this.logger
      );

      if (result.endedNow) {
        this.logger.info(
          `Ended session ${sessionId}: ${result.summary.totalReviewed} reviews, ${result.summary.successCount} successful`
        );
        this.emit('session.ended', { sessionId, userId: result.session.userId, summary: result.summary });
      }
      return result.summary;
    });
  }

  /**
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async getSession(sessionId: string): Promise<ReviewSession> {
    requireId('sessionId', sessionId);
    return this.load(sessionId);
  }

  private async load(sessionId: string): Promise<ReviewSession> {
    return withRetry('loadSession', () => this.findOrThrow(sessionId), this.config.retry, this.logger);
  }

  private async findOrThrow(sessionId: string): Promise<ReviewSession> {
    const session = await this.sessions.findById(sessionId);
    if (session === null) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private emit<K extends ReviewEventType>(type: K, data: ReviewEventPayloads[K]): void {
    this.events?.emit(type, data);
  }
}
