/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the review engine, loaded from
 * environment variables. Every value has a default, so an empty environment
 * yields a working configuration.
 *
 * | Variable                   | Default          |
 * |----------------------------|------------------|
 * | NODE_ENV                   | development      |
 * | DATABASE_PATH              | review-engine.db |
 * | LOG_LEVEL                  | info (silent under test) |
 * | DEFAULT_ALGORITHM          | SM2              |
 * | MAX_INTERVAL_DAYS          | 3650             |
 * | ANKI_LEARNING_STEPS        | 1,10             |
 * | ANKI_GRADUATING_INTERVAL   | 1                |
 * | ANKI_EASY_INTERVAL         | 4                |
 * | ANKI_EASY_BONUS            | 1.3              |
 * | ANKI_LAPSE_PENALTY         | 0.2              |
 * | ANKI_LEECH_THRESHOLD       | 8                |
 * | LEITNER_BOX_INTERVALS      | 1,2,4,8,16       |
 * | STORE_RETRY_ATTEMPTS       | 3                |
 * | STORE_RETRY_BASE_DELAY_MS  | 50               |
 * | STORE_RETRY_MAX_DELAY_MS   | 1000             |
 * | BULK_CONCURRENCY           | 4                |
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig();
 *   console.log(config.database.path);
 *
 * @module config
 */

import { z } from 'zod';
import { ALGORITHMS } from './core/models';

// =============================================================================
// Configuration Schema
// =============================================================================

const positiveInt = z.number().int().positive();

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Database configuration
  database: z.object({
    path: z.string().min(1).default('review-engine.db'),
  }),

  // Logging configuration
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),

  // Algorithm selection and shared limits
  scheduling: z.object({
    defaultAlgorithm: z.enum(ALGORITHMS).default('SM2'),
    maxIntervalDays: positiveInt.default(3650),
  }),

  // Anki-style strategy tuning
  anki: z.object({
    learningStepsMinutes: z.array(z.number().positive()).min(1).default([1, 10]),
    graduatingIntervalDays: positiveInt.default(1),
    easyIntervalDays: positiveInt.default(4),
    easyBonus: z.number().min(1).default(1.3),
    lapsePenalty: z.number().nonnegative().default(0.2),
    leechThreshold: z.number().int().nonnegative().default(8),
  }),

  // Leitner strategy tuning
  leitner: z.object({
    boxIntervalsDays: z.array(positiveInt).min(1).default([1, 2, 4, 8, 16]),
  }),

  // Store retry policy
  retry: z
    .object({
      attempts: positiveInt.default(3),
      baseDelayMs: z.number().int().nonnegative().default(50),
      maxDelayMs: z.number().int().nonnegative().default(1000),
    })
    .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
      message: 'max delay must not be below base delay',
      path: ['maxDelayMs'],
    }),

  // Bulk scheduling
  bulk: z.object({
    concurrency: positiveInt.default(4),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable behind each configuration path, for error messages.
 */
const ENV_VARS: Record<string, string> = {
  nodeEnv: 'NODE_ENV',
  'database.path': 'DATABASE_PATH',
  'logging.level': 'LOG_LEVEL',
  'scheduling.defaultAlgorithm': 'DEFAULT_ALGORITHM',
  'scheduling.maxIntervalDays': 'MAX_INTERVAL_DAYS',
  'anki.learningStepsMinutes': 'ANKI_LEARNING_STEPS',
  'anki.graduatingIntervalDays': 'ANKI_GRADUATING_INTERVAL',
  'anki.easyIntervalDays': 'ANKI_EASY_INTERVAL',
  'anki.easyBonus': 'ANKI_EASY_BONUS',
  'anki.lapsePenalty': 'ANKI_LAPSE_PENALTY',
  'anki.leechThreshold': 'ANKI_LEECH_THRESHOLD',
  'leitner.boxIntervalsDays': 'LEITNER_BOX_INTERVALS',
  'retry.attempts': 'STORE_RETRY_ATTEMPTS',
  'retry.baseDelayMs': 'STORE_RETRY_BASE_DELAY_MS',
  'retry.maxDelayMs': 'STORE_RETRY_MAX_DELAY_MS',
  'bulk.concurrency': 'BULK_CONCURRENCY',
};

// =============================================================================
// Environment Variable Loading
// =============================================================================

export type Environment = Record<string, string | undefined>;

function isBlank(value: string | undefined): value is undefined {
  return value === undefined || value.trim() === '';
}

/**
 * Parse a number from an environment variable string.
 * Returns undefined when unset; malformed input becomes NaN so the schema
 * reports it instead of silently falling back to the default.
 */
function parseNumber(value: string | undefined): number | undefined {
  if (isBlank(value)) return undefined;
  return Number(value.trim());
}

/**
 * Parse a comma-separated list of numbers.
 */
function parseNumberList(value: string | undefined): number[] | undefined {
  if (isBlank(value)) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(Number);
}

function parseString(value: string | undefined): string | undefined {
  return isBlank(value) ? undefined : value.trim();
}

/**
 * Builds the raw config object from environment variables. The result is
 * unchecked; the schema validates it.
 */
function loadFromEnvironment(env: Environment): Record<string, unknown> {
  const nodeEnv = parseString(env.NODE_ENV);

  return {
    nodeEnv,
    database: {
      path: parseString(env.DATABASE_PATH),
    },
    logging: {
      level: parseString(env.LOG_LEVEL) ?? (nodeEnv === 'test' ? 'silent' : 'info'),
    },
    scheduling: {
      defaultAlgorithm: parseString(env.DEFAULT_ALGORITHM),
      maxIntervalDays: parseNumber(env.MAX_INTERVAL_DAYS),
    },
    anki: {
      learningStepsMinutes: parseNumberList(env.ANKI_LEARNING_STEPS),
      graduatingIntervalDays: parseNumber(env.ANKI_GRADUATING_INTERVAL),
      easyIntervalDays: parseNumber(env.ANKI_EASY_INTERVAL),
      easyBonus: parseNumber(env.ANKI_EASY_BONUS),
      lapsePenalty: parseNumber(env.ANKI_LAPSE_PENALTY),
      leechThreshold: parseNumber(env.ANKI_LEECH_THRESHOLD),
    },
    leitner: {
      boxIntervalsDays: parseNumberList(env.LEITNER_BOX_INTERVALS),
    },
    retry: {
      attempts: parseNumber(env.STORE_RETRY_ATTEMPTS),
      baseDelayMs: parseNumber(env.STORE_RETRY_BASE_DELAY_MS),
      maxDelayMs: parseNumber(env.STORE_RETRY_MAX_DELAY_MS),
    },
    bulk: {
      concurrency: parseNumber(env.BULK_CONCURRENCY),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Loads and validates configuration from environment variables.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws {ConfigValidationError} Listing every invalid variable
 *
 * @example
 * ```typescript
 * try {
 *   const config = loadConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Invalid vars:', error.invalidVars.map((v) => v.name));
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (parseResult.success) {
    return parseResult.data;
  }

  const invalidVars = parseResult.error.issues.map((issue) => {
    // List items report their index; the variable is the list itself
    const path = issue.path.filter((segment) => typeof segment === 'string').join('.');
    return { name: ENV_VARS[path] ?? path, reason: issue.message };
  });

  const descriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
  throw new ConfigValidationError(`Invalid configuration: ${descriptions}`, invalidVars);
}
