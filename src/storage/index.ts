/**
 * Storage Module - Barrel Export
 *
 * SQLite implementations of the engine's store contracts.
 *
 * Usage:
 *   import { createDatabase, applySchema, ReviewScheduleRepository } from '@/storage';
 *
 *   const db = createDatabase(config.database.path);
 *   applySchema(db);
 *   const schedules = new ReviewScheduleRepository(db);
 */

export { createDatabase, applySchema, closeDatabase, SCHEMA_SQL_PATH } from './db';
export type { AppDatabase, AppTransaction } from './db';

export { memoryItems, reviewSchedules, reviewHistory, reviewSessions } from './schema';
export type { DbSessionSummary } from './schema';

export { isTransientSqliteError, runStoreCall } from './sqlite-errors';
export { migrate } from './migrate';

export * from './repositories';
