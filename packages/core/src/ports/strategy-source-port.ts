/**
 * Strategy Source Port
 *
 * Produces candidate strategies for a mission (a language-model planner, a
 * template library, a file). The pipeline never depends on a specific source.
 */

import type { StrategySpecInput } from '../domain/strategy.js';

export type StrategyContext = Record<string, unknown>;

export interface StrategySourcePort {
  /**
   * Generate candidate strategies. Candidates are unvalidated input.
   */
  generate(mission: string, context: StrategyContext): Promise<StrategySpecInput[]>;
}
