/**
 * Runtime handed to CLI commands: the engine plus the item repository,
 * opened lazily so `--help` never touches the database.
 */

import type { Config } from '../config';
import { createReviewEngine, createSqliteStores, type ReviewEngine } from '../engine';
import { createLogger } from '../core/logging';
import { applySchema, closeDatabase, createDatabase, type AppDatabase } from '../storage/db';
import type { MemoryItemRepository } from '../storage/repositories';

export interface CliRuntime {
  db: AppDatabase;
  engine: ReviewEngine;
  items: MemoryItemRepository;
}

export interface CliContext {
  /** Returns the runtime, opening it on first use */
  runtime(): CliRuntime;
  /** Writes one result to stdout */
  write(output: string): void;
}

/**
 * Opens the configured SQLite database, applying the schema on first use.
 */
export function openSqliteRuntime(config: Config): CliRuntime {
  const db = createDatabase(config.database.path);
  applySchema(db);
  const stores = createSqliteStores(db);
  const logger = createLogger('review-engine', { level: config.logging.level });
  return {
    db,
    engine: createReviewEngine({ stores, config, logger }),
    items: stores.items,
  };
}

/**
 * Context over a runtime factory, caching the runtime once opened.
 */
export function createCliContext(open: () => CliRuntime, write: (output: string) => void): CliContext & { close(): void } {
  let opened: CliRuntime | null = null;
  return {
    runtime() {
      opened ??= open();
      return opened;
    },
    write,
    close() {
      if (opened !== null) {
        closeDatabase(opened.db);
        opened = null;
      }
    },
  };
}
