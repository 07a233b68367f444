/**
 * Scheduling Algorithms Module
 *
 * Pure strategies that turn a MemoryStrength and a review rating into the
 * next MemoryStrength and due date.
 *
 * @example
 * ```typescript
 * import { createAlgorithmRegistry } from '@/core/algorithms';
 *
 * const registry = createAlgorithmRegistry();
 * const { strength, nextDue, isLeech } = registry.SM2.apply(current, 'GOOD');
 * ```
 */

export { SM2Strategy } from './sm2';
export type { SM2Config } from './sm2';
export { AnkiStrategy, DEFAULT_ANKI_CONFIG } from './anki';
export type { AnkiConfig } from './anki';
export { LeitnerStrategy, DEFAULT_LEITNER_CONFIG } from './leitner';
export type { LeitnerConfig } from './leitner';
export { DoublingStrategy } from './custom';
export type { DoublingConfig } from './custom';
export { createAlgorithmRegistry } from './registry';
export type { AlgorithmRegistry, AlgorithmRegistryConfig } from './registry';
export {
  MIN_STABILITY,
  nextStability,
  retrievability,
  retentionAtDue,
} from './forgetting-curve';
export {
  DEFAULT_MAX_INTERVAL_DAYS,
  DEFAULT_EASY_BONUS,
  parseDifficulty,
} from './types';
export type { AlgorithmResult, AlgorithmStrategy, BaseAlgorithmConfig } from './types';
