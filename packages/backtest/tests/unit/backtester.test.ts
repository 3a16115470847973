import { describe, it, expect } from 'vitest';
import { Backtester, resolveSymbols } from '../../src/engine/backtester.js';
import { ALWAYS_ENTER, DAY_MS, JAN_1_2024, dailyBars, flatBars, makeStrategy } from '../helpers/bars.js';

const BUY_FACTOR = 1.0005 * 1.001;
const SELL_FACTOR = 0.9995 * 0.999;

describe('Backtester', () => {
  const backtester = new Backtester();

  it('returns zero metrics when no bars are available', () => {
    const result = backtester.run(makeStrategy({ rules: [ALWAYS_ENTER] }), {});
    expect(result.metrics).toEqual({ sharpe: 0, max_drawdown: 0, total_return: 0 });
    expect(result.trade_log).toEqual([]);
    expect(result.equity_curve).toEqual([]);
  });

  it('never trades a strategy without entry rules', () => {
    const result = backtester.run(makeStrategy(), { AAPL: flatBars(10) });
    expect(result.trade_log).toEqual([]);
    expect(result.equity_curve).toHaveLength(10);
    expect(result.metrics).toEqual({ sharpe: 0, max_drawdown: 0, total_return: 0 });
  });

  it('enters at the first bar and closes at the last on a flat series', () => {
    const result = backtester.run(makeStrategy({ rules: [ALWAYS_ENTER] }), { AAPL: flatBars(30) });

    expect(result.trade_log).toHaveLength(2);
    const [buy, sell] = result.trade_log;
    expect(buy).toMatchObject({ timestamp: JAN_1_2024, symbol: 'AAPL', side: 'buy', quantity: 20 });
    expect(buy?.price).toBeCloseTo(100 * BUY_FACTOR, 10);
    expect(sell).toMatchObject({ timestamp: JAN_1_2024 + 29 * DAY_MS, side: 'sell', quantity: 20 });
    expect(sell?.price).toBeCloseTo(100 * SELL_FACTOR, 10);

    // Only the round-trip costs are lost: 20 * (100.15005 - 99.85005) = 6
    expect(result.equity_curve).toHaveLength(30);
    expect(result.equity_curve[0]?.value).toBeCloseTo(99996.999, 6);
    expect(result.equity_curve[29]?.value).toBeCloseTo(99994, 6);
    expect(result.metrics.total_return).toBeCloseTo(-0.00006, 9);
    expect(result.metrics.max_drawdown).toBeCloseTo(0.00006, 9);
    expect(result.metrics.sharpe).toBeLessThan(0);
  });

  it('applies custom transaction costs', () => {
    const result = backtester.run(
      makeStrategy({ rules: [ALWAYS_ENTER] }),
      { AAPL: flatBars(5) },
      { commission: 0, slippage_pct: 0 }
    );
    expect(result.trade_log.map((trade) => trade.price)).toEqual([100, 100]);
    expect(result.metrics.total_return).toBe(0);
  });

  it('sizes fixed_size positions from the notional', () => {
    const strategy = makeStrategy({
      rules: [ALWAYS_ENTER],
      params: { position_sizing: 'fixed_size', fraction: 0.02, fixed_size_notional: 500, timeframe: '1d' },
    });
    const result = backtester.run(strategy, { AAPL: flatBars(3, 40) });
    expect(result.trade_log[0]?.quantity).toBe(12.5);
  });

  it('skips entries it cannot afford', () => {
    const strategy = makeStrategy({
      rules: [ALWAYS_ENTER],
      params: { position_sizing: 'fixed_size', fraction: 0.02, timeframe: '1d' },
    });
    const result = new Backtester({ initialCapital: 500 }).run(strategy, { AAPL: flatBars(5) });
    expect(result.trade_log).toEqual([]);
    expect(result.equity_curve.every((point) => point.value === 500)).toBe(true);
  });

  it('exits when an exit rule fires and does not enter on the last bar', () => {
    const strategy = makeStrategy({
      rules: [ALWAYS_ENTER, { type: 'exit', indicator: 'price', params: { condition: 'above', threshold: 110 } }],
    });
    const result = backtester.run(strategy, { AAPL: dailyBars([100, 100, 120, 90]) });

    expect(result.trade_log.map((trade) => [trade.side, trade.timestamp])).toEqual([
      ['buy', JAN_1_2024],
      ['sell', JAN_1_2024 + 2 * DAY_MS],
    ]);
    expect(result.trade_log[1]?.price).toBeCloseTo(120 * SELL_FACTOR, 10);
  });

  it('shares cash across symbols and steps over the union of timestamps', () => {
    const strategy = makeStrategy({ universe: ['AAPL', 'MSFT'], rules: [ALWAYS_ENTER] });
    const result = backtester.run(strategy, {
      AAPL: flatBars(5),
      MSFT: flatBars(5, 100, JAN_1_2024 + 2 * DAY_MS),
    });

    expect(result.equity_curve).toHaveLength(7);
    expect(result.trade_log.map((trade) => `${trade.side}:${trade.symbol}`)).toEqual([
      'buy:AAPL',
      'buy:MSFT',
      'sell:AAPL',
      'sell:MSFT',
    ]);
    // MSFT is sized from equity after the AAPL purchase: 0.02 * 99996.999 / 100
    expect(result.trade_log[1]?.quantity).toBe(20);
  });

  it('prefers a rising series', () => {
    const closes = Array.from({ length: 30 }, (_, i) => 100 + i);
    const result = backtester.run(makeStrategy({ rules: [ALWAYS_ENTER] }), { AAPL: dailyBars(closes) });
    expect(result.metrics.sharpe).toBeGreaterThan(0);
    expect(result.metrics.total_return).toBeGreaterThan(0);
  });
});

describe('resolveSymbols', () => {
  const bars = { AAPL: flatBars(2), MSFT: flatBars(2), EMPTY: [] };

  it('keeps universe symbols that have bars', () => {
    expect(resolveSymbols(makeStrategy({ universe: ['AAPL', 'TSLA'] }), bars)).toEqual(['AAPL']);
  });

  it('falls back to every symbol with bars when the universe is empty', () => {
    expect(resolveSymbols(makeStrategy({ universe: [] }), bars)).toEqual(['AAPL', 'MSFT']);
  });
});
