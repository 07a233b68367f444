/**
 * Database Schema Runner
 *
 * Applies schema.sql to the configured SQLite database. Every statement is
 * idempotent, so running this repeatedly is safe.
 *
 * Usage:
 *   npm run db:migrate                              # Uses DATABASE_PATH or the default
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { fileURLToPath } from 'node:url';
import { loadConfig } from '../config';
import { createLogger } from '../core/logging';
import { createDatabase, applySchema, closeDatabase, type AppDatabase } from './db';

/**
 * Applies the schema and returns the user tables now present.
 */
export function migrate(db: AppDatabase): string[] {
  applySchema(db);
  return db.$client
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .pluck()
    .all()
    .filter((name): name is string => typeof name === 'string');
}

// Run only when executed directly, not when imported by the CLI
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const config = loadConfig();
  const logger = createLogger('migrate', { level: config.logging.level });

  logger.info('Applying schema', { databasePath: config.database.path });
  const db = createDatabase(config.database.path);

  try {
    const tables = migrate(db);
    logger.info('Schema applied', { tables });
  } catch (error) {
    logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  } finally {
    closeDatabase(db);
  }
}
