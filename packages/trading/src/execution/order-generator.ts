/**
 * Order Generator
 *
 * Translates backtest signals and current holdings into market orders. The
 * target per symbol is the backtest's net signal (buys minus sells); when that
 * nets to zero the strategy's position sizing decides the target.
 */

import { createLogger } from '@stratgate/utils';
import {
  DEFAULT_FIXED_SIZE_NOTIONAL,
  type Order,
  type PortfolioState,
  type StrategySpec,
  type Trade,
} from '@stratgate/core';
import { holdings, portfolioValue, round2 } from '../positions/portfolio-value.js';
import type { PriceMap } from '../types.js';

const logger = createLogger('trading:orders');

/** Differences at or below this many shares are not traded */
export const DUST_THRESHOLD = 0.01;

/**
 * Net backtest quantity per symbol, accumulated in timestamp order
 */
export function netSignals(trades: Trade[]): Map<string, number> {
  const net = new Map<string, number>();
  const ordered = [...trades].sort((a, b) => a.timestamp - b.timestamp);
  for (const trade of ordered) {
    const delta = trade.side === 'buy' ? trade.quantity : -trade.quantity;
    net.set(trade.symbol, (net.get(trade.symbol) ?? 0) + delta);
  }
  return net;
}

export class OrderGenerator {
  generate(
    strategy: StrategySpec,
    portfolio: PortfolioState,
    latestPrices: PriceMap,
    backtestTrades: Trade[]
  ): Order[] {
    const value = portfolioValue(portfolio, latestPrices);
    if (value <= 0) {
      logger.warn('Portfolio value is zero or negative, cannot generate orders', { value });
      return [];
    }

    const signals = netSignals(backtestTrades);
    const current = holdings(portfolio);
    const universe = strategy.universe.length > 0 ? strategy.universe : Object.keys(latestPrices);
    const orders: Order[] = [];

    for (const symbol of universe) {
      const price = latestPrices[symbol];
      if (price === undefined || !Number.isFinite(price)) {
        logger.warn('Symbol has no latest price, skipping', { symbol });
        continue;
      }

      const signal = signals.get(symbol) ?? 0;
      const target = round2(signal !== 0 ? signal : this.sizedTarget(strategy, value, price));
      const held = current.get(symbol) ?? 0;
      const difference = target - held;

      if (Math.abs(difference) <= DUST_THRESHOLD) continue;

      const order: Order = {
        symbol,
        side: difference > 0 ? 'buy' : 'sell',
        quantity: round2(Math.abs(difference)),
        type: 'market',
      };
      orders.push(order);
      logger.info('Generated order', { symbol, side: order.side, quantity: order.quantity, target, current: held });
    }

    return orders;
  }

  /**
   * Target quantity from position sizing alone
   */
  private sizedTarget(strategy: StrategySpec, value: number, price: number): number {
    if (price <= 0) return 0;
    const notional =
      strategy.params.position_sizing === 'fixed_size'
        ? strategy.params.fixed_size_notional ?? DEFAULT_FIXED_SIZE_NOTIONAL
        : strategy.params.fraction * value;
    return notional / price;
  }
}
