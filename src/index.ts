/**
 * Spaced Review Engine - Public API
 *
 * ```typescript
 * import { createDatabase, applySchema, createReviewEngine, createSqliteStores } from 'spaced-review-engine';
 *
 * const db = createDatabase('reviews.db');
 * applySchema(db);
 * const engine = createReviewEngine({ stores: createSqliteStores(db) });
 * const due = await engine.scheduler.getDueItems('user_1');
 * ```
 */

export { createReviewEngine, createSqliteStores } from './engine';
export type { ReviewEngine, ReviewEngineOptions, ReviewEngineStores } from './engine';

export { loadConfig, ConfigValidationError } from './config';
export type { Config, Environment } from './config';

export * from './core/errors';
export { createLogger } from './core/logging';
export type { Logger, LoggerConfig, LogLevel } from './core/logging';
export * from './core/models';
export * from './core/algorithms';
export * from './core/events';
export * from './core/scheduling';
export * from './core/session';
export * from './core/bulk';
export * from './core/analytics';
export type { ContentStore, HistoryQuery, HistoryStore, ScheduleStore, SessionStore, SessionUpdate } from './core/stores';

export * from './storage';
