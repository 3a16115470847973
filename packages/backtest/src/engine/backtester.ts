/**
 * Backtester
 *
 * Event-driven, long-only replay of a strategy over historical bars. All
 * symbols share one cash balance and are stepped over the union of their
 * timestamps; a symbol without a bar at a timestamp is marked at its last close.
 */

import { createLogger } from '@stratgate/utils';
import {
  DEFAULT_COSTS,
  DEFAULT_FIXED_SIZE_NOTIONAL,
  ZERO_METRICS,
  periodsPerYear,
  type BacktestResult,
  type Bar,
  type BarsBySymbol,
  type EquityPoint,
  type StrategySpec,
  type Trade,
  type TransactionCosts,
} from '@stratgate/core';
import { computeMetrics } from '../metrics/performance.js';
import { allOf, anyOf, compileRule, type SignalFn } from './rule-eval.js';

const logger = createLogger('backtest:engine');

export const DEFAULT_INITIAL_CAPITAL = 100_000;

export interface BacktesterOptions {
  initialCapital?: number;
}

interface SymbolState {
  symbol: string;
  bars: Bar[];
  indexByTimestamp: Map<number, number>;
  entry: SignalFn;
  exit: SignalFn;
  quantity: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Symbols to trade: the universe when given, else every symbol with data
 */
export function resolveSymbols(strategy: StrategySpec, barsBySymbol: BarsBySymbol): string[] {
  const candidates = strategy.universe.length > 0 ? strategy.universe : Object.keys(barsBySymbol);
  return candidates.filter((symbol) => (barsBySymbol[symbol]?.length ?? 0) > 0);
}

export class Backtester {
  readonly initialCapital: number;

  constructor(options: BacktesterOptions = {}) {
    this.initialCapital = options.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
  }

  run(
    strategy: StrategySpec,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts> = {}
  ): BacktestResult {
    const commission = costs.commission ?? DEFAULT_COSTS.commission;
    const slippage = costs.slippage_pct ?? DEFAULT_COSTS.slippage_pct;
    const buyFactor = (1 + slippage) * (1 + commission);
    const sellFactor = (1 - slippage) * (1 - commission);

    const states = resolveSymbols(strategy, barsBySymbol).map((symbol) =>
      this.prepareSymbol(strategy, symbol, barsBySymbol[symbol] ?? [])
    );

    if (states.length === 0) {
      logger.warn('No bars available for backtest', { strategyId: strategy.strategy_id });
      return { strategy, metrics: { ...ZERO_METRICS }, trade_log: [], equity_curve: [] };
    }

    const timestamps = Array.from(
      new Set(states.flatMap((state) => state.bars.map((bar) => bar.timestamp)))
    ).sort((a, b) => a - b);

    let cash = this.initialCapital;
    const lastClose = new Map<string, number>();
    const trades: Trade[] = [];
    const equityCurve: EquityPoint[] = [];

    const markToMarket = (): number =>
      states.reduce((total, state) => total + state.quantity * (lastClose.get(state.symbol) ?? 0), cash);

    for (const timestamp of timestamps) {
      for (const state of states) {
        const index = state.indexByTimestamp.get(timestamp);
        const bar = index === undefined ? undefined : state.bars[index];
        if (bar) lastClose.set(state.symbol, bar.close);
      }

      for (const state of states) {
        const index = state.indexByTimestamp.get(timestamp);
        if (index === undefined) continue;
        const bar = state.bars[index];
        if (!bar) continue;
        const isLastBar = index === state.bars.length - 1;

        if (state.quantity > 0) {
          if (isLastBar || state.exit(index)) {
            const price = bar.close * sellFactor;
            cash += state.quantity * price;
            trades.push({ timestamp, symbol: state.symbol, side: 'sell', quantity: state.quantity, price });
            state.quantity = 0;
          }
          continue;
        }

        if (isLastBar || !state.entry(index) || bar.close <= 0) continue;

        const target =
          strategy.params.position_sizing === 'fixed_size'
            ? strategy.params.fixed_size_notional ?? DEFAULT_FIXED_SIZE_NOTIONAL
            : strategy.params.fraction * markToMarket();
        const quantity = round2(target / bar.close);
        const price = bar.close * buyFactor;
        const cost = quantity * price;
        if (quantity <= 0 || cost > cash) {
          logger.debug('Skipping entry', { symbol: state.symbol, quantity, cost, cash });
          continue;
        }

        cash -= cost;
        state.quantity = quantity;
        trades.push({ timestamp, symbol: state.symbol, side: 'buy', quantity, price });
      }

      equityCurve.push({ timestamp, value: markToMarket() });
    }

    const metrics = computeMetrics(
      equityCurve.map((point) => point.value),
      this.initialCapital,
      periodsPerYear(strategy.params.timeframe)
    );

    logger.info('Backtest complete', {
      strategyId: strategy.strategy_id,
      trades: trades.length,
      sharpe: metrics.sharpe,
      totalReturn: metrics.total_return,
      maxDrawdown: metrics.max_drawdown,
    });

    return { strategy, metrics, trade_log: trades, equity_curve: equityCurve };
  }

  private prepareSymbol(strategy: StrategySpec, symbol: string, raw: Bar[]): SymbolState {
    const bars = [...raw].sort((a, b) => a.timestamp - b.timestamp);
    const closes = bars.map((bar) => bar.close);
    const indexByTimestamp = new Map<number, number>();
    // Duplicate timestamps: the last bar wins
    bars.forEach((bar, index) => indexByTimestamp.set(bar.timestamp, index));

    const entrySignals = strategy.rules
      .filter((rule) => rule.type === 'entry')
      .map((rule) => compileRule(rule, closes));
    const exitSignals = strategy.rules
      .filter((rule) => rule.type === 'exit')
      .map((rule) => compileRule(rule, closes));

    const entry = allOf(entrySignals);
    const exit: SignalFn = exitSignals.length > 0 ? anyOf(exitSignals) : (index) => !entry(index);

    return { symbol, bars, indexByTimestamp, entry, exit, quantity: 0 };
  }
}
