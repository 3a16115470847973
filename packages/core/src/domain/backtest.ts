/**
 * Backtest and validation results
 */

import { z } from 'zod';
import { StrategySpecSchema } from './strategy.js';

export const SideSchema = z.enum(['buy', 'sell']);
export type Side = z.infer<typeof SideSchema>;

export const TradeSchema = z.object({
  timestamp: z.number().int(),
  symbol: z.string().min(1),
  side: SideSchema,
  quantity: z.number().positive(),
  price: z.number().nonnegative(),
});

export type Trade = z.infer<typeof TradeSchema>;

export const BacktestMetricsSchema = z.object({
  sharpe: z.number(),
  max_drawdown: z.number().min(0).max(1),
  total_return: z.number().optional(),
});

export type BacktestMetrics = z.infer<typeof BacktestMetricsSchema>;

export const EquityPointSchema = z.object({
  timestamp: z.number().int(),
  value: z.number(),
});

export type EquityPoint = z.infer<typeof EquityPointSchema>;

export const BacktestResultSchema = z.object({
  strategy: StrategySpecSchema,
  metrics: BacktestMetricsSchema,
  trade_log: z.array(TradeSchema),
  equity_curve: z.array(EquityPointSchema),
});

export type BacktestResult = z.infer<typeof BacktestResultSchema>;

/**
 * Transaction costs as fractions of the fill price
 */
export const TransactionCostsSchema = z.object({
  commission: z.number().min(0).default(0.001),
  slippage_pct: z.number().min(0).default(0.0005),
});

export type TransactionCosts = z.infer<typeof TransactionCostsSchema>;

export const DEFAULT_COSTS: TransactionCosts = { commission: 0.001, slippage_pct: 0.0005 };

export const WalkForwardResultSchema = z.object({
  windows: z.array(BacktestResultSchema),
  aggregate_metrics: BacktestMetricsSchema,
  train_metrics: BacktestMetricsSchema,
  validation_metrics: BacktestMetricsSchema,
  holdout_metrics: BacktestMetricsSchema.optional(),
});

export type WalkForwardResult = z.infer<typeof WalkForwardResultSchema>;

export const ZERO_METRICS: BacktestMetrics = { sharpe: 0, max_drawdown: 0, total_return: 0 };
