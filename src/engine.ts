/**
 * Review Engine Factory
 *
 * Wires the scheduler, session manager, bulk scheduler and statistics
 * aggregator over a set of stores, with strategy tuning, retry policy and
 * log level taken from a validated Config.
 *
 * @example
 * ```typescript
 * const db = createDatabase(':memory:');
 * applySchema(db);
 * const engine = createReviewEngine({ stores: createSqliteStores(db) });
 *
 * engine.events.on('item.leech', (event) => notify(event.data));
 * await engine.scheduler.scheduleReview({ itemId, userId, difficulty: 'GOOD' });
 * ```
 */

import { loadConfig, type Config } from './config';
import { createLogger, type Logger } from './core/logging';
import { createAlgorithmRegistry, type AlgorithmRegistry, type AlgorithmStrategy } from './core/algorithms';
import { ReviewEventBus } from './core/events';
import { ReviewScheduler } from './core/scheduling';
import { SessionManager } from './core/session';
import { BulkScheduler } from './core/bulk';
import { StatisticsAggregator } from './core/analytics';
import type { ContentStore, HistoryStore, ScheduleStore, SessionStore } from './core/stores';
import type { AppDatabase } from './storage/db';
import {
  MemoryItemRepository,
  ReviewHistoryRepository,
  ReviewScheduleRepository,
  ReviewSessionRepository,
} from './storage/repositories';

export interface ReviewEngineStores {
  schedules: ScheduleStore;
  history: HistoryStore;
  content: ContentStore;
  sessions: SessionStore;
}

export interface ReviewEngineOptions {
  stores: ReviewEngineStores;
  /** Defaults to the built-in defaults (an empty environment) */
  config?: Config;
  /** Supply a bus to subscribe before the engine is built; one is created otherwise */
  events?: ReviewEventBus;
  logger?: Logger;
  clock?: () => Date;
  /** Replaces the built-in CUSTOM strategy */
  customStrategy?: AlgorithmStrategy;
}

export interface ReviewEngine {
  config: Config;
  algorithms: AlgorithmRegistry;
  events: ReviewEventBus;
  scheduler: ReviewScheduler;
  sessions: SessionManager;
  bulk: BulkScheduler;
  statistics: StatisticsAggregator;
}

/**
 * SQLite-backed stores sharing one database. `items` is both the content
 * store and the repository the CLI uses to add and delete items.
 */
export function createSqliteStores(db: AppDatabase): ReviewEngineStores & { items: MemoryItemRepository } {
  const items = new MemoryItemRepository(db);
  return {
    items,
    content: items,
    schedules: new ReviewScheduleRepository(db),
    history: new ReviewHistoryRepository(db),
    sessions: new ReviewSessionRepository(db),
  };
}

export function createReviewEngine(options: ReviewEngineOptions): ReviewEngine {
  const config = options.config ?? loadConfig({});
  const logger = options.logger ?? createLogger('ReviewEngine', { level: config.logging.level });
  const clock = options.clock ?? (() => new Date());
  const { stores } = options;

  const algorithms = createAlgorithmRegistry({
    maxIntervalDays: config.scheduling.maxIntervalDays,
    anki: config.anki,
    leitner: config.leitner,
    custom: options.customStrategy,
  });

  const events = options.events ?? new ReviewEventBus(logger.child('ReviewEventBus'));

  const scheduler = new ReviewScheduler(
    {
      schedules: stores.schedules,
      history: stores.history,
      content: stores.content,
      algorithms,
      events,
      logger: logger.child('ReviewScheduler'),
      clock,
    },
    {
      defaultAlgorithm: config.scheduling.defaultAlgorithm,
      retry: config.retry,
      maxIntervalDays: config.scheduling.maxIntervalDays,
    }
  );

  const sessions = new SessionManager(
    {
      scheduler,
      sessions: stores.sessions,
      events,
      logger: logger.child('SessionManager'),
      clock,
    },
    { defaultAlgorithm: config.scheduling.defaultAlgorithm, retry: config.retry }
  );

  const bulk = new BulkScheduler(
    { scheduler, logger: logger.child('BulkScheduler'), clock },
    { concurrency: config.bulk.concurrency, maxIntervalDays: config.scheduling.maxIntervalDays }
  );

  const statistics = new StatisticsAggregator({
    history: stores.history,
    logger: logger.child('StatisticsAggregator'),
    clock,
    retry: config.retry,
  });

  return { config, algorithms, events, scheduler, sessions, bulk, statistics };
}
