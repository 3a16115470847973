/**
 * Stress scenarios and gating rules
 */

import { z } from 'zod';
import { BacktestResultSchema } from './backtest.js';

export const ScenarioSchema = z.object({
  scenario_id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  /** Inclusive ISO date (YYYY-MM-DD, UTC) */
  start_date: z.string(),
  /** Inclusive ISO date (YYYY-MM-DD, UTC) */
  end_date: z.string(),
  tags: z.array(z.string()).default([]),
});

export type Scenario = z.infer<typeof ScenarioSchema>;

export const GatingMetricSchema = z.enum(['max_drawdown', 'sharpe', 'total_return']);
export type GatingMetric = z.infer<typeof GatingMetricSchema>;

export const GatingOperatorSchema = z.enum(['<', '<=', '>', '>=', '==']);
export type GatingOperator = z.infer<typeof GatingOperatorSchema>;

export const GatingRuleSchema = z.object({
  metric: GatingMetricSchema,
  operator: GatingOperatorSchema,
  threshold: z.number(),
  /** Empty or absent: applies to every scenario */
  scenario_tags: z.array(z.string()).optional(),
});

export type GatingRule = z.infer<typeof GatingRuleSchema>;

export const ScenarioResultSchema = z.object({
  scenario: ScenarioSchema,
  backtest: BacktestResultSchema,
  passed: z.boolean(),
  violations: z.array(z.string()),
});

export type ScenarioResult = z.infer<typeof ScenarioResultSchema>;

export const GatingResultSchema = z.object({
  passed: z.boolean(),
  scenario_results: z.array(ScenarioResultSchema),
  overall_passed: z.boolean(),
  blocking_violations: z.array(z.string()),
});

export type GatingResult = z.infer<typeof GatingResultSchema>;
