/**
 * Strategy specification
 *
 * A strategy is pure data: a universe, indicator rules and sizing parameters.
 * It is never mutated once a run starts.
 */

import { z } from 'zod';

export const RuleParamValueSchema = z.union([z.number(), z.string(), z.boolean()]);

export const StrategyRuleSchema = z.object({
  type: z.enum(['entry', 'exit']),
  indicator: z.string().min(1),
  params: z.record(z.string(), RuleParamValueSchema).default({}),
});

export type StrategyRule = z.infer<typeof StrategyRuleSchema>;
export type RuleParams = StrategyRule['params'];

export const PositionSizingSchema = z.enum(['fixed_fraction', 'fixed_size']);
export type PositionSizing = z.infer<typeof PositionSizingSchema>;

export const MIN_POSITION_FRACTION = 0.01;
export const MAX_POSITION_FRACTION = 0.05;

export const StrategyParamsSchema = z.object({
  position_sizing: PositionSizingSchema.default('fixed_fraction'),
  fraction: z.number().min(MIN_POSITION_FRACTION).max(MAX_POSITION_FRACTION).default(0.02),
  fixed_size_notional: z.number().positive().optional(),
  timeframe: z.string().min(1).default('1d'),
});

export type StrategyParams = z.infer<typeof StrategyParamsSchema>;

export const StrategySpecSchema = z.object({
  strategy_id: z.string().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  universe: z.array(z.string().min(1)).default([]),
  rules: z.array(StrategyRuleSchema),
  params: StrategyParamsSchema,
});

export type StrategySpec = z.infer<typeof StrategySpecSchema>;

/** Accepted input shape (defaults not yet applied) */
export type StrategySpecInput = z.input<typeof StrategySpecSchema>;

export const DEFAULT_FIXED_SIZE_NOTIONAL = 1000;
