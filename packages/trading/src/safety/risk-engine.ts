/**
 * Risk Engine
 *
 * Validates proposed orders against risk limits and safety rules. Every check
 * is deterministic and the engine keeps no state between calls: the caller
 * supplies the portfolio, prices and equity curve each time.
 */

import { createLogger, getRiskSettings, type RiskSettings } from '@stratgate/utils';
import {
  MAX_POSITION_FRACTION,
  MIN_POSITION_FRACTION,
  type Order,
  type PortfolioState,
  type RiskAssessment,
  type RiskLevel,
  type StrategySpec,
} from '@stratgate/core';
import { markPrice, portfolioValue } from '../positions/portfolio-value.js';
import type { PriceMap } from '../types.js';

const logger = createLogger('trading:risk');

const EXPOSURE_WEIGHT = 0.6;
const DRAWDOWN_WEIGHT = 0.4;

export interface AssessOptions {
  /** Strategy the orders came from; enables universe and parameter re-validation */
  strategy?: StrategySpec;
}

interface Holding {
  quantity: number;
  price: number;
}

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Decline of the last value from the curve's peak, as a fraction of the peak
 */
export function currentDrawdown(equityCurve: number[]): number | undefined {
  const last = equityCurve[equityCurve.length - 1];
  if (last === undefined) return undefined;
  let peak = last;
  for (const value of equityCurve) {
    if (value > peak) peak = value;
  }
  return peak > 0 ? Math.max(0, (peak - last) / peak) : 0;
}

function grossExposure(holdings: Map<string, Holding>): number {
  let total = 0;
  for (const holding of holdings.values()) {
    total += Math.abs(holding.quantity) * holding.price;
  }
  return total;
}

/**
 * Share of a limit used, capped at 1. A zero limit is fully used by any positive value.
 */
function utilisation(value: number, limit: number): number {
  if (limit <= 0) return value > 0 ? 1 : 0;
  return Math.min(1, Math.max(0, value / limit));
}

export class RiskEngine {
  private readonly limits: RiskSettings;
  private readonly blacklist: Set<string>;

  constructor(limits: RiskSettings = getRiskSettings()) {
    this.limits = limits;
    this.blacklist = new Set(limits.blacklist.map((symbol) => symbol.toUpperCase()));
  }

  assess(
    portfolio: PortfolioState,
    proposedOrders: Order[],
    latestPrices: PriceMap,
    equityCurve?: number[],
    options: AssessOptions = {}
  ): RiskAssessment {
    const value = portfolioValue(portfolio, latestPrices);
    const warnings: string[] = [];
    const batchViolations = this.checkStrategy(options.strategy);

    const drawdown = equityCurve ? currentDrawdown(equityCurve) : undefined;
    const drawdownBlocked = drawdown !== undefined && drawdown > this.limits.maxDrawdownThreshold;
    if (drawdown !== undefined && drawdownBlocked) {
      batchViolations.push(
        `Current drawdown ${pct(drawdown)} exceeds threshold ${pct(this.limits.maxDrawdownThreshold)}; all orders rejected`
      );
    }

    const initial = new Map<string, Holding>();
    for (const position of portfolio.positions) {
      initial.set(position.symbol, {
        quantity: (initial.get(position.symbol)?.quantity ?? 0) + position.quantity,
        price: markPrice(portfolio, position.symbol, latestPrices) ?? 0,
      });
    }

    // Approved orders accumulate into the projection, so later orders see earlier ones
    const projected = new Map(initial);
    const orderViolations: string[] = [];
    let approved: Order[] = [];

    for (const order of proposedOrders) {
      const price = this.referencePrice(order, latestPrices, warnings);
      const rejection = this.checkOrder(order, price, value, projected, options.strategy);
      if (rejection) {
        orderViolations.push(rejection);
        continue;
      }
      approved.push(order);
      const delta = order.side === 'buy' ? order.quantity : -order.quantity;
      projected.set(order.symbol, { quantity: (projected.get(order.symbol)?.quantity ?? 0) + delta, price });
    }

    if (batchViolations.length > 0) {
      approved = [];
    }

    const exposure = value > 0 ? grossExposure(approved.length > 0 ? projected : initial) / value : 1;
    const riskScore =
      EXPOSURE_WEIGHT * utilisation(exposure, this.limits.maxPortfolioExposure) +
      DRAWDOWN_WEIGHT * utilisation(drawdown ?? 0, this.limits.maxDrawdownThreshold);

    const violations = [...batchViolations, ...orderViolations];
    const riskLevel: RiskLevel =
      violations.length > 0 ? 'BLOCK' : riskScore >= this.limits.warningScore ? 'WARNING' : 'SAFE';
    if (riskLevel === 'WARNING') {
      warnings.push(
        `Risk score ${riskScore.toFixed(2)} is at or above the warning level ${this.limits.warningScore}`
      );
    }

    logger.info('Risk assessment complete', {
      proposed: proposedOrders.length,
      approved: approved.length,
      violations: violations.length,
      riskLevel,
      riskScore,
      drawdownBlocked,
    });

    return {
      approved_trades: approved,
      violations,
      risk_level: riskLevel,
      risk_score: riskScore,
      warnings,
      ...(drawdown !== undefined ? { current_drawdown: drawdown } : {}),
      drawdown_blocked: drawdownBlocked,
    };
  }

  /**
   * Price used to value an order: limit price, latest price, else the configured fallback
   */
  private referencePrice(order: Order, latestPrices: PriceMap, warnings: string[]): number {
    if (order.limit_price !== undefined) return order.limit_price;
    const latest = latestPrices[order.symbol];
    if (latest !== undefined && Number.isFinite(latest)) return latest;

    const fallback = this.limits.fallbackReferencePrice;
    warnings.push(`No price available for ${order.symbol}; using fallback reference price ${fallback}`);
    logger.warn('Using fallback reference price', { symbol: order.symbol, fallback });
    return fallback;
  }

  private checkOrder(
    order: Order,
    price: number,
    value: number,
    projected: Map<string, Holding>,
    strategy: StrategySpec | undefined
  ): string | undefined {
    const { symbol } = order;

    if (this.blacklist.has(symbol.toUpperCase())) {
      return `Symbol ${symbol} is blacklisted`;
    }
    if (strategy && strategy.universe.length > 0 && !strategy.universe.includes(symbol)) {
      return `Symbol ${symbol} is not in the universe of strategy ${strategy.strategy_id}`;
    }

    const notional = Math.abs(order.quantity) * price;
    if (notional > this.limits.maxTradeNotional) {
      return `Order for ${symbol} exceeds max trade notional (${notional.toFixed(2)} > ${this.limits.maxTradeNotional.toFixed(2)})`;
    }

    if (value <= 0) {
      return `Portfolio value ${value.toFixed(2)} is not positive; order for ${symbol} rejected`;
    }

    const held = projected.get(symbol);
    const delta = order.side === 'buy' ? order.quantity : -order.quantity;
    const symbolNotional = Math.abs((held?.quantity ?? 0) + delta) * price;
    const heldNotional = held ? Math.abs(held.quantity) * held.price : 0;

    const exposure = (grossExposure(projected) - heldNotional + symbolNotional) / value;
    if (exposure > this.limits.maxPortfolioExposure) {
      return `Order for ${symbol} exceeds max portfolio exposure (${pct(exposure)} > ${pct(this.limits.maxPortfolioExposure)})`;
    }

    const symbolShare = symbolNotional / value;
    if (symbolShare > this.limits.maxPositionPerSymbol) {
      return `Order for ${symbol} exceeds max position per symbol (${pct(symbolShare)} > ${pct(this.limits.maxPositionPerSymbol)})`;
    }

    return undefined;
  }

  /**
   * Whole-batch re-validation of the strategy parameters
   */
  private checkStrategy(strategy: StrategySpec | undefined): string[] {
    if (!strategy) return [];
    const problems: string[] = [];
    const { fraction } = strategy.params;
    if (fraction < MIN_POSITION_FRACTION || fraction > MAX_POSITION_FRACTION) {
      problems.push(
        `Strategy ${strategy.strategy_id} position fraction ${fraction} is outside [${MIN_POSITION_FRACTION}, ${MAX_POSITION_FRACTION}]`
      );
    }
    if (strategy.universe.length === 0) {
      problems.push(`Strategy ${strategy.strategy_id} has an empty universe`);
    }
    return problems;
  }
}
