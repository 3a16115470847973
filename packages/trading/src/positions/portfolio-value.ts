/**
 * Portfolio valuation helpers
 */

import type { PortfolioState } from '@stratgate/core';
import type { PriceMap } from '../types.js';

/**
 * Mark price for a held symbol: latest price, else the position's average price
 */
export function markPrice(portfolio: PortfolioState, symbol: string, latestPrices: PriceMap): number | undefined {
  const latest = latestPrices[symbol];
  if (latest !== undefined && Number.isFinite(latest)) return latest;
  return portfolio.positions.find((position) => position.symbol === symbol)?.average_price;
}

/**
 * Cash plus every position marked to market
 */
export function portfolioValue(portfolio: PortfolioState, latestPrices: PriceMap): number {
  return portfolio.positions.reduce(
    (total, position) =>
      total + position.quantity * (markPrice(portfolio, position.symbol, latestPrices) ?? 0),
    portfolio.cash
  );
}

/**
 * Quantity held per symbol
 */
export function holdings(portfolio: PortfolioState): Map<string, number> {
  const bySymbol = new Map<string, number>();
  for (const position of portfolio.positions) {
    bySymbol.set(position.symbol, (bySymbol.get(position.symbol) ?? 0) + position.quantity);
  }
  return bySymbol;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
