/**
 * Maps driver failures onto the engine's error taxonomy.
 *
 * SQLITE_BUSY and SQLITE_LOCKED (and their extended codes such as
 * SQLITE_BUSY_SNAPSHOT) mean another connection holds the lock; they become
 * TransientStoreError so the scheduler retries. Everything else propagates
 * unchanged.
 */

import { TransientStoreError } from '@/core/errors';

const TRANSIENT_CODE_PREFIXES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

function sqliteCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Drizzle may wrap the driver error
  if (error instanceof Error && error.cause !== undefined) {
    return sqliteCode(error.cause);
  }
  return null;
}

export function isTransientSqliteError(error: unknown): boolean {
  const code = sqliteCode(error);
  return code !== null && TRANSIENT_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/**
 * Runs a store call, translating lock contention into TransientStoreError.
 */
export async function runStoreCall<T>(operation: string, call: () => T): Promise<T> {
  try {
    return call();
  } catch (error) {
    if (isTransientSqliteError(error)) {
      throw new TransientStoreError(`Database busy during ${operation}`, error);
    }
    throw error;
  }
}
