/**
 * Portfolio, orders, fills and risk assessment
 */

import { z } from 'zod';
import { SideSchema } from './backtest.js';

export const PortfolioPositionSchema = z.object({
  symbol: z.string().min(1),
  quantity: z.number(),
  average_price: z.number().nonnegative(),
});

export type PortfolioPosition = z.infer<typeof PortfolioPositionSchema>;

export const PortfolioStateSchema = z.object({
  cash: z.number(),
  positions: z.array(PortfolioPositionSchema).default([]),
});

export type PortfolioState = z.infer<typeof PortfolioStateSchema>;

export const OrderTypeSchema = z.enum(['market', 'limit']);
export type OrderType = z.infer<typeof OrderTypeSchema>;

export const OrderSchema = z.object({
  symbol: z.string().min(1),
  side: SideSchema,
  quantity: z.number().positive(),
  type: OrderTypeSchema.default('market'),
  limit_price: z.number().positive().optional(),
});

export type Order = z.infer<typeof OrderSchema>;

export const FillSchema = z.object({
  order_id: z.string(),
  symbol: z.string(),
  side: SideSchema,
  quantity: z.number().positive(),
  price: z.number().nonnegative(),
  timestamp: z.number().int(),
});

export type Fill = z.infer<typeof FillSchema>;

export const RiskLevelSchema = z.enum(['SAFE', 'WARNING', 'BLOCK']);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const RiskAssessmentSchema = z.object({
  approved_trades: z.array(OrderSchema),
  violations: z.array(z.string()),
  risk_level: RiskLevelSchema,
  risk_score: z.number().min(0).max(1),
  warnings: z.array(z.string()),
  current_drawdown: z.number().optional(),
  drawdown_blocked: z.boolean(),
});

export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

/**
 * Quantity held for a symbol (0 when absent)
 */
export function positionQuantity(portfolio: PortfolioState, symbol: string): number {
  return portfolio.positions.find((position) => position.symbol === symbol)?.quantity ?? 0;
}
