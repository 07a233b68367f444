/**
 * Algorithm dispatch table.
 *
 * One strategy per Algorithm value, chosen by the caller's explicit enum at
 * review time. The table is built once from configuration and never mutated.
 */

import type { Algorithm } from '../models';
import { AnkiStrategy, type AnkiConfig } from './anki';
import { DoublingStrategy } from './custom';
import { LeitnerStrategy, type LeitnerConfig } from './leitner';
import { SM2Strategy } from './sm2';
import type { AlgorithmStrategy, BaseAlgorithmConfig } from './types';

export type AlgorithmRegistry = Readonly<Record<Algorithm, AlgorithmStrategy>>;

export interface AlgorithmRegistryConfig extends Partial<BaseAlgorithmConfig> {
  /** Anki options; its own easyBonus or ceiling wins over the shared one */
  anki?: Partial<AnkiConfig>;
  leitner?: Partial<LeitnerConfig>;
  /** Strategy to use for CUSTOM instead of the built-in doubling scheme */
  custom?: AlgorithmStrategy;
}

/**
 * Builds the dispatch table. Shared options (interval ceiling, easy bonus)
 * reach every built-in strategy.
 *
 * @example
 * ```typescript
 * const registry = createAlgorithmRegistry({
 *   maxIntervalDays: 365,
 *   anki: { leechThreshold: 4 },
 * });
 * registry.ANKI.apply(strength, 'AGAIN', new Date());
 * ```
 */
export function createAlgorithmRegistry(config: AlgorithmRegistryConfig = {}): AlgorithmRegistry {
  const shared: Partial<BaseAlgorithmConfig> = {};
  if (config.maxIntervalDays !== undefined) shared.maxIntervalDays = config.maxIntervalDays;
  if (config.easyBonus !== undefined) shared.easyBonus = config.easyBonus;

  return Object.freeze({
    SM2: new SM2Strategy(shared),
    ANKI: new AnkiStrategy({ ...shared, ...config.anki }),
    LEITNER: new LeitnerStrategy({ ...shared, ...config.leitner }),
    CUSTOM: config.custom ?? new DoublingStrategy(shared),
  });
}
