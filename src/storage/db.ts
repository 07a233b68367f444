/**
 * Database Connection Factory for the Review Engine
 *
 * Opens SQLite through better-sqlite3 and wraps it with Drizzle ORM. There is
 * no module-level instance: callers (the CLI, the engine factory, tests)
 * create the database they need and own its lifetime.
 *
 * Usage:
 *   import { createDatabase, applySchema } from '@/storage/db';
 *
 *   const db = createDatabase(':memory:'); // in-memory for tests
 *   applySchema(db);
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/**
 * Milliseconds better-sqlite3 waits on a locked database before reporting
 * SQLITE_BUSY, which the repositories surface as a transient store error.
 */
const BUSY_TIMEOUT_MS = 2000;

/**
 * Creates a Drizzle ORM database instance connected to the specified SQLite file.
 *
 * @param dbPath - Path to the SQLite database file, or ':memory:'
 *
 * @example
 * const db = createDatabase('/var/data/reviews.db');
 */
export function createDatabase(dbPath: string = 'review-engine.db') {
  const sqlite = new Database(dbPath, { timeout: BUSY_TIMEOUT_MS });

  // SQLite has foreign keys disabled by default for backwards compatibility
  sqlite.pragma('foreign_keys = ON');

  // WAL lets readers proceed while a review commits; not available in memory
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;

/**
 * Transaction handle passed to `db.transaction` callbacks.
 */
export type AppTransaction = Parameters<Parameters<AppDatabase['transaction']>[0]>[0];

/**
 * Location of the DDL file beside this module.
 */
export const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Creates any missing tables and indexes. Safe to run on every start.
 */
export function applySchema(db: AppDatabase): void {
  db.$client.exec(readFileSync(SCHEMA_SQL_PATH, 'utf8'));
}

/**
 * Closes the underlying SQLite connection.
 */
export function closeDatabase(db: AppDatabase): void {
  db.$client.close();
}
