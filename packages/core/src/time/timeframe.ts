/**
 * Timeframe helpers
 *
 * Bar timeframe labels mapped to trading periods per year, used to annualize
 * Sharpe ratios. Intraday figures assume 252 sessions of 6.5 hours.
 */

import { createLogger } from '@stratgate/utils';

const logger = createLogger('core:timeframe');

export const DEFAULT_PERIODS_PER_YEAR = 252;

export const PERIODS_PER_YEAR = {
  '1m': 98280,
  '5m': 19656,
  '15m': 6552,
  '30m': 3276,
  '1h': 1638,
  '4h': 409.5,
  '1d': 252,
  '1w': 52,
  '1mo': 12,
} as const satisfies Record<string, number>;

export type Timeframe = keyof typeof PERIODS_PER_YEAR;

export function isTimeframe(label: string): label is Timeframe {
  return Object.prototype.hasOwnProperty.call(PERIODS_PER_YEAR, label);
}

/**
 * Trading periods per year for a timeframe label; unknown labels fall back to daily
 */
export function periodsPerYear(timeframe: string): number {
  if (isTimeframe(timeframe)) {
    return PERIODS_PER_YEAR[timeframe];
  }
  logger.warn('Unknown timeframe, assuming daily bars', {
    timeframe,
    periodsPerYear: DEFAULT_PERIODS_PER_YEAR,
  });
  return DEFAULT_PERIODS_PER_YEAR;
}
