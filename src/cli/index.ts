#!/usr/bin/env tsx
/**
 * CLI Entry Point for the Review Engine
 *
 * Loads `.env`, validates configuration, and runs one command against the
 * configured SQLite database. Results are printed as JSON on stdout; errors
 * go to stderr with a non-zero exit code.
 *
 * Available Commands:
 * - `migrate` - Create missing tables and indexes
 * - `items add|list|delete` - Manage memory items
 * - `review <item-id> <difficulty>` - Record a review outcome
 * - `due` - List due items by priority
 * - `schedule`, `reschedule`, `bulk` - Create or change schedules
 * - `best-hour` - Best UTC review hour for a user
 * - `session start|record|end|show` - Review sessions
 * - `stats` - Learning statistics
 *
 * Usage:
 * ```bash
 * npm run cli -- items add "The mitochondria is the powerhouse of the cell"
 * npm run cli -- review mem_... GOOD --user u1
 * DATABASE_PATH=/tmp/reviews.db npm run cli -- due --user u1
 * ```
 */

import * as dotenv from 'dotenv';
import { ConfigValidationError, loadConfig } from '../config';
import { ReviewEngineError } from '../core/errors';
import { createCliContext, openSqliteRuntime } from './context';
import { createProgram } from './program';
import { dim, formatJson, red } from './utils/terminal';

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  const context = createCliContext(
    () => openSqliteRuntime(config),
    (output) => console.log(output)
  );

  try {
    await createProgram(context).parseAsync(process.argv);
  } finally {
    context.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(red('Invalid configuration:'));
    for (const invalid of error.invalidVars) {
      console.error(dim(`  ${invalid.name}: ${invalid.reason}`));
    }
  } else if (error instanceof ReviewEngineError) {
    console.error(red(`Error: ${error.message}`));
    console.error(formatJson({ code: error.code, details: error.details }));
  } else {
    console.error(red('Fatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));

    // Show stack trace in development mode
    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack ?? ''));
    }
  }

  process.exitCode = 1;
});
