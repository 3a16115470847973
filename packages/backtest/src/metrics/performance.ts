import type { BacktestMetrics } from '@stratgate/core';

/**
 * Period-over-period returns of an equity series; a non-positive base yields 0
 */
export function periodReturns(values: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const previous = values[i - 1] ?? 0;
    const current = values[i] ?? 0;
    returns.push(previous > 0 ? (current - previous) / previous : 0);
  }
  return returns;
}

/**
 * Annualized Sharpe ratio (risk-free rate 0, population standard deviation).
 * A flat return series scores 0.
 */
export function sharpeRatio(returns: number[], periodsPerYear: number): number {
  if (returns.length < 2) return 0;
  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / returns.length;
  const std = Math.sqrt(variance);
  // Float noise on a flat curve must not turn into a huge ratio
  if (!(std > 1e-12)) return 0;
  return (mean / std) * Math.sqrt(periodsPerYear);
}

/**
 * Largest peak-to-trough decline as a fraction of the peak, with the peak
 * seeded at `initialValue`
 */
export function maxDrawdown(values: number[], initialValue: number): number {
  let peak = initialValue;
  let worst = 0;
  for (const value of values) {
    if (value > peak) peak = value;
    const drawdown = peak > 0 ? (peak - value) / peak : 0;
    if (drawdown > worst) worst = drawdown;
  }
  return Math.min(1, Math.max(0, worst));
}

/**
 * Metrics for an equity curve that started at `initialValue`
 */
export function computeMetrics(
  values: number[],
  initialValue: number,
  periodsPerYear: number
): BacktestMetrics {
  if (values.length === 0 || initialValue <= 0) {
    return { sharpe: 0, max_drawdown: 0, total_return: 0 };
  }
  const finalValue = values[values.length - 1] ?? initialValue;
  return {
    sharpe: sharpeRatio(periodReturns([initialValue, ...values]), periodsPerYear),
    max_drawdown: maxDrawdown(values, initialValue),
    total_return: finalValue / initialValue - 1,
  };
}
