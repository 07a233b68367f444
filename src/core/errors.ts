/**
 * Review Engine Error Taxonomy
 *
 * Every failure the engine can surface is a subclass of ReviewEngineError,
 * carrying a machine-readable code so callers can branch without parsing
 * messages:
 *
 * - Caller input: InvalidDifficultyError, InvalidStateError
 * - Preconditions: ItemNotFoundError, ScheduleNotFoundError,
 *   SessionNotFoundError, SessionClosedError
 * - Store transients: TransientStoreError, ConcurrentModificationError
 *   (retried by the scheduler)
 * - StoreUnavailableError once retries are exhausted
 *
 * @example
 * ```typescript
 * try {
 *   await scheduler.scheduleReview({ itemId, userId, difficulty: 'GOOD' });
 * } catch (error) {
 *   if (error instanceof ReviewEngineError && error.code === ErrorCodes.ITEM_NOT_FOUND) {
 *     // drop the review
 *   }
 * }
 * ```
 */

/**
 * Standard error codes used throughout the engine.
 */
export const ErrorCodes = {
  // Caller input
  INVALID_DIFFICULTY: 'INVALID_DIFFICULTY',
  INVALID_STATE: 'INVALID_STATE',

  // Preconditions
  ITEM_NOT_FOUND: 'ITEM_NOT_FOUND',
  SCHEDULE_NOT_FOUND: 'SCHEDULE_NOT_FOUND',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  SESSION_CLOSED: 'SESSION_CLOSED',

  // Store
  STORE_TRANSIENT: 'STORE_TRANSIENT',
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',

  // Fallback for unexpected failures reported as data (bulk results)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for all engine errors.
 */
export class ReviewEngineError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** Whether retrying the same operation from a fresh read may succeed */
  public readonly retryable: boolean;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, retryable: boolean = false, details?: unknown) {
    super(message);
    this.name = 'ReviewEngineError';
    this.code = code;
    this.retryable = retryable;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * A review difficulty was missing or not one of AGAIN, HARD, GOOD, EASY.
 */
export class InvalidDifficultyError extends ReviewEngineError {
  constructor(received: unknown) {
    super(
      ErrorCodes.INVALID_DIFFICULTY,
      `Invalid review difficulty: ${JSON.stringify(received) ?? 'undefined'}. Expected one of AGAIN, HARD, GOOD, EASY`,
      false,
      { received }
    );
    this.name = 'InvalidDifficultyError';
  }
}

/**
 * A strength, schedule or request field failed validation.
 */
export class InvalidStateError extends ReviewEngineError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.INVALID_STATE, message, false, details);
    this.name = 'InvalidStateError';
  }
}

export class ItemNotFoundError extends ReviewEngineError {
  constructor(public readonly itemId: string) {
    super(ErrorCodes.ITEM_NOT_FOUND, `Item with ID '${itemId}' not found`, false, { itemId });
    this.name = 'ItemNotFoundError';
  }
}

export class ScheduleNotFoundError extends ReviewEngineError {
  constructor(itemId: string, userId: string) {
    super(
      ErrorCodes.SCHEDULE_NOT_FOUND,
      `No active schedule for item '${itemId}' and user '${userId}'`,
      false,
      { itemId, userId }
    );
    this.name = 'ScheduleNotFoundError';
  }
}

export class SessionNotFoundError extends ReviewEngineError {
  constructor(public readonly sessionId: string) {
    super(ErrorCodes.SESSION_NOT_FOUND, `Session with ID '${sessionId}' not found`, false, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class SessionClosedError extends ReviewEngineError {
  constructor(public readonly sessionId: string) {
    super(ErrorCodes.SESSION_CLOSED, `Session '${sessionId}' has already ended`, false, { sessionId });
    this.name = 'SessionClosedError';
  }
}

/**
 * A store call failed for a reason that may clear up on its own
 * (timeout, lock contention, busy database).
 */
export class TransientStoreError extends ReviewEngineError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.STORE_TRANSIENT, message, true, cause === undefined ? undefined : { cause: describeCause(cause) });
    this.name = 'TransientStoreError';
  }
}

/**
 * An optimistic commit lost against another writer of the same record.
 *
 * @param subject - The record, e.g. "Schedule for item 'mem_1' and user 'u1'"
 */
export class ConcurrentModificationError extends ReviewEngineError {
  constructor(subject: string, expectedVersion: number, details: Record<string, unknown> = {}) {
    super(ErrorCodes.CONCURRENT_MODIFICATION, `${subject} changed since version ${expectedVersion}`, true, {
      ...details,
      expectedVersion,
    });
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Store retries were exhausted.
 */
export class StoreUnavailableError extends ReviewEngineError {
  constructor(operation: string, attempts: number, lastError: unknown) {
    super(
      ErrorCodes.STORE_UNAVAILABLE,
      `Store operation '${operation}' failed after ${attempts} attempts`,
      false,
      { operation, attempts, lastError: describeCause(lastError) }
    );
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Whether an error is worth retrying from a fresh read.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ReviewEngineError && error.retryable;
}

/**
 * Reduces any thrown value to a { code, message } pair for reporting.
 */
export function toErrorInfo(error: unknown): { code: ErrorCode; message: string } {
  if (error instanceof ReviewEngineError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: ErrorCodes.INTERNAL_ERROR, message: error.message };
  }
  return { code: ErrorCodes.INTERNAL_ERROR, message: String(error) };
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
