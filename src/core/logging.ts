/**
 * Console Logger
 *
 * Small prefix-tagged logger used by every engine component. Output looks like:
 * ```
 * [ReviewScheduler] Retrying commitReview (attempt 2/3) after 100ms
 * [BulkScheduler] Item 'mem_42' failed: ITEM_NOT_FOUND
 * ```
 *
 * A level threshold keeps tests quiet (`silent`) while the CLI logs at `info`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Configuration options for a logger
 */
export interface LoggerConfig {
  /** Minimum level that is written */
  level: LogLevel;
  /** Whether to include an ISO timestamp in each line */
  includeTimestamp: boolean;
  /** Whether to colour the prefix (for terminal output) */
  colorize: boolean;
}

/**
 * Default logger configuration
 */
const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
  includeTimestamp: false,
  colorize: process.env.NODE_ENV !== 'production',
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function getLevelColor(level: LogLevel): string {
  switch (level) {
    case 'error':
      return colors.red;
    case 'warn':
      return colors.yellow;
    case 'debug':
      return colors.dim;
    default:
      return colors.cyan;
  }
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Returns a logger sharing this configuration under another prefix */
  child(prefix: string): Logger;
}

/**
 * Creates a logger that writes `[prefix] message` lines to the console.
 *
 * @param prefix - Component name shown in brackets
 * @param config - Optional partial configuration to override defaults
 */
export function createLogger(prefix: string, config?: Partial<LoggerConfig>): Logger {
  const resolved: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolved.level]) {
      return;
    }

    const tag = resolved.colorize
      ? `${getLevelColor(level)}[${prefix}]${colors.reset}`
      : `[${prefix}]`;
    const timestamp = resolved.includeTimestamp ? `${new Date().toISOString()} ` : '';
    const line = `${timestamp}${tag} ${message}`;
    const args: unknown[] = context === undefined ? [line] : [line, context];

    switch (level) {
      case 'error':
        console.error(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'debug':
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (childPrefix) => createLogger(childPrefix, resolved),
  };
}
