/**
 * Indicator Series Utilities
 *
 * Array-based indicator calculations over a close-price series. Every function
 * returns a series of the same length as its input, with NaN wherever the
 * value is undefined (warm-up period, division by zero).
 */

import { ValidationError } from '@stratgate/utils';
import type { RuleParams } from '@stratgate/core';

export type IndicatorName = 'price' | 'sma' | 'ema' | 'returns' | 'zscore' | 'momentum' | 'crossover';

export const INDICATOR_NAMES: readonly IndicatorName[] = [
  'price',
  'sma',
  'ema',
  'returns',
  'zscore',
  'momentum',
  'crossover',
];

function assertWindow(window: number, label: string): void {
  if (!Number.isInteger(window) || window <= 0) {
    throw new ValidationError(`${label} must be a positive integer`, { [label]: window });
  }
}

function nanSeries(length: number): number[] {
  return new Array<number>(length).fill(Number.NaN);
}

/**
 * Simple Moving Average over a value array
 */
export function sma(values: number[], window: number): number[] {
  assertWindow(window, 'window');
  const out = nanSeries(values.length);
  if (values.length < window) return out;

  for (let i = window - 1; i < values.length; i++) {
    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) {
      sum += values[j] ?? Number.NaN;
    }
    out[i] = sum / window;
  }
  return out;
}

/**
 * Exponential Moving Average over a value array, seeded with the SMA of the first window
 */
export function ema(values: number[], window: number): number[] {
  assertWindow(window, 'window');
  const out = nanSeries(values.length);
  if (values.length < window) return out;

  const k = 2 / (window + 1);
  let prev = values.slice(0, window).reduce((sum, v) => sum + v, 0) / window;
  out[window - 1] = prev;

  for (let i = window; i < values.length; i++) {
    prev = ((values[i] ?? Number.NaN) - prev) * k + prev;
    out[i] = prev;
  }
  return out;
}

/**
 * Period-over-period returns; the first value is NaN, as is any step from a zero price
 */
export function calculateReturns(prices: number[]): number[] {
  const out = nanSeries(prices.length);
  for (let i = 1; i < prices.length; i++) {
    const previous = prices[i - 1] ?? 0;
    const current = prices[i] ?? Number.NaN;
    if (previous !== 0) {
      out[i] = (current - previous) / previous;
    }
  }
  return out;
}

/**
 * Rolling z-score using the population standard deviation; a flat window scores 0
 */
export function zscore(values: number[], window: number): number[] {
  assertWindow(window, 'window');
  const out = nanSeries(values.length);
  if (values.length < window) return out;

  for (let i = window - 1; i < values.length; i++) {
    const slice = values.slice(i - window + 1, i + 1);
    const mean = slice.reduce((sum, v) => sum + v, 0) / window;
    const variance = slice.reduce((sum, v) => sum + (v - mean) ** 2, 0) / window;
    const std = Math.sqrt(variance);
    const current = values[i] ?? Number.NaN;
    if (Number.isNaN(std)) continue;
    out[i] = std > 0 ? (current - mean) / std : 0;
  }
  return out;
}

/**
 * Price change over `lookback` bars as a fraction (0.05 = +5%)
 */
export function momentum(prices: number[], lookback: number): number[] {
  assertWindow(lookback, 'lookback');
  const out = nanSeries(prices.length);
  for (let i = lookback; i < prices.length; i++) {
    const past = prices[i - lookback] ?? 0;
    if (past !== 0) {
      out[i] = (prices[i] ?? Number.NaN) / past - 1;
    }
  }
  return out;
}

/**
 * Read a numeric rule parameter, accepting any of the given aliases
 */
export function numberParam(params: RuleParams, keys: string[], fallback: number): number {
  for (const key of keys) {
    const value = params[key];
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value);
    }
  }
  return fallback;
}

function isIndicatorName(name: string): name is IndicatorName {
  return INDICATOR_NAMES.some((known) => known === name);
}

/**
 * Evaluate a named indicator over a close-price series
 */
export function evaluateIndicator(name: string, closes: number[], params: RuleParams = {}): number[] {
  const indicator = name.toLowerCase();
  if (!isIndicatorName(indicator)) {
    throw new ValidationError(`Unknown indicator: ${name}`, { indicator: name });
  }

  switch (indicator) {
    case 'price':
      return [...closes];
    case 'sma':
      return sma(closes, numberParam(params, ['window'], 20));
    case 'ema':
      return ema(closes, numberParam(params, ['window'], 20));
    case 'returns':
      return calculateReturns(closes);
    case 'zscore':
      return zscore(calculateReturns(closes), numberParam(params, ['window'], 20));
    case 'momentum':
      return momentum(closes, numberParam(params, ['lookback', 'window'], 10));
    case 'crossover': {
      const fast = sma(closes, numberParam(params, ['fast', 'fast_window'], 10));
      const slow = sma(closes, numberParam(params, ['slow', 'slow_window'], 20));
      return fast.map((value, i) => value - (slow[i] ?? Number.NaN));
    }
  }
}
