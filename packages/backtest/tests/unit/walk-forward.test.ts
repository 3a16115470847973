import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { ConfigurationError } from '@stratgate/utils';
import {
  WalkForwardValidator,
  aggregateMetrics,
  createWindows,
  sliceBars,
  splitData,
} from '../../src/validation/walk-forward.js';
import { DAY_MS, JAN_1_2024, dailyBars, flatBars, makeStrategy } from '../helpers/bars.js';
import type { BacktestResult } from '@stratgate/core';

const utc = (iso: string) => DateTime.fromISO(iso, { zone: 'utc' });
const isoDates = (window: DateTime[]) => window.map((d) => d.toISODate());

describe('splitData', () => {
  it('splits chronologically at floor boundaries', () => {
    const bars = dailyBars([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    const splits = splitData({ AAPL: [...bars].reverse() }, { train: 0.7, validation: 0.15, holdout: 0.15 });

    expect(splits.train.AAPL?.map((bar) => bar.close)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(splits.validation.AAPL?.map((bar) => bar.close)).toEqual([8]);
    expect(splits.holdout.AAPL?.map((bar) => bar.close)).toEqual([9, 10]);
  });

  it('skips symbols without bars', () => {
    const splits = splitData({ EMPTY: [] }, { train: 0.7, validation: 0.15, holdout: 0.15 });
    expect(splits.train).toEqual({});
  });

  it('rejects fractions that do not sum to one', () => {
    expect(() => splitData({}, { train: 0.5, validation: 0.2, holdout: 0.2 })).toThrow(ConfigurationError);
  });

  it('accepts a sum within the tolerance', () => {
    expect(() => splitData({}, { train: 0.7, validation: 0.15, holdout: 0.155 })).not.toThrow();
  });

  it('rejects negative fractions', () => {
    expect(() => splitData({}, { train: -0.1, validation: 0.6, holdout: 0.5 })).toThrow(
      'Split fractions must be non-negative'
    );
  });
});

describe('createWindows', () => {
  const start = utc('2024-01-01');
  const end = utc('2024-04-10');

  it('anchors expanding windows at the start and needs 30 training days', () => {
    const windows = createWindows(start, end);

    expect(windows).toHaveLength(56);
    expect(isoDates(windows[0] ?? [])).toEqual(['2024-01-01', '2024-01-31', '2024-01-31', '2024-02-15']);
    expect(isoDates(windows[55] ?? [])).toEqual(['2024-01-01', '2024-03-26', '2024-03-26', '2024-04-10']);
  });

  it('rolls a fixed training window that never starts before the range', () => {
    const windows = createWindows(start, end, {
      expanding: false,
      windowSizeDays: 40,
      testWindowDays: 10,
      stepSizeDays: 5,
    });

    expect(windows).toHaveLength(11);
    expect(isoDates(windows[0] ?? [])).toEqual(['2024-01-01', '2024-02-10', '2024-02-10', '2024-02-20']);
    expect(isoDates(windows[10] ?? [])).toEqual(['2024-02-20', '2024-03-31', '2024-03-31', '2024-04-10']);
  });

  it('returns no windows for a range shorter than the minimum training period', () => {
    expect(createWindows(start, utc('2024-01-20'))).toEqual([]);
  });

  it('rejects a non-positive step', () => {
    expect(() => createWindows(start, end, { stepSizeDays: 0 })).toThrow(ConfigurationError);
  });
});

describe('sliceBars', () => {
  it('keeps bars inside the inclusive range and drops empty symbols', () => {
    const sliced = sliceBars(
      { AAPL: flatBars(5), MSFT: flatBars(2, 100, JAN_1_2024 + 10 * DAY_MS) },
      JAN_1_2024 + DAY_MS,
      JAN_1_2024 + 3 * DAY_MS
    );
    expect(Object.keys(sliced)).toEqual(['AAPL']);
    expect(sliced.AAPL?.map((bar) => bar.timestamp)).toEqual([
      JAN_1_2024 + DAY_MS,
      JAN_1_2024 + 2 * DAY_MS,
      JAN_1_2024 + 3 * DAY_MS,
    ]);
  });
});

describe('aggregateMetrics', () => {
  const result = (sharpe: number, max_drawdown: number, total_return: number): BacktestResult => ({
    strategy: makeStrategy(),
    metrics: { sharpe, max_drawdown, total_return },
    trade_log: [],
    equity_curve: [],
  });

  it('takes the unweighted mean', () => {
    expect(aggregateMetrics([result(1, 0.1, 0.2), result(2, 0.3, -0.1)])).toEqual({
      sharpe: 1.5,
      max_drawdown: 0.2,
      total_return: 0.05,
    });
  });

  it('is zero for no results', () => {
    expect(aggregateMetrics([])).toEqual({ sharpe: 0, max_drawdown: 0, total_return: 0 });
  });
});

describe('WalkForwardValidator', () => {
  const validator = new WalkForwardValidator();
  const strategy = makeStrategy();
  const bars = { AAPL: flatBars(100) };
  const zero = { sharpe: 0, max_drawdown: 0, total_return: 0 };

  it('runs a single backtest when walk-forward is off', () => {
    const result = validator.run(strategy, bars);
    expect(result.windows).toHaveLength(1);
    expect(result.train_metrics).toEqual(result.aggregate_metrics);
    expect(result.validation_metrics).toEqual(result.aggregate_metrics);
    expect(result.holdout_metrics).toBeUndefined();
  });

  it('backtests train, validation and holdout splits', () => {
    const result = validator.run(strategy, bars, {}, { walk_forward: true });
    expect(result.windows).toHaveLength(3);
    expect(result.windows[0]?.equity_curve).toHaveLength(70);
    expect(result.windows[1]?.equity_curve).toHaveLength(15);
    expect(result.windows[2]?.equity_curve).toHaveLength(15);
    expect(result.windows[2]?.metrics).toEqual(result.holdout_metrics);
    expect(result.holdout_metrics).toEqual(zero);
  });

  it('omits the holdout when its fraction is zero', () => {
    const result = validator.run(strategy, bars, {}, {
      walk_forward: true,
      train_split: 0.8,
      validation_split: 0.2,
      holdout_split: 0,
    });
    expect(result.holdout_metrics).toBeUndefined();
    expect(result.windows).toHaveLength(2);
  });

  it('backtests each test window in windows mode', () => {
    const result = validator.run(strategy, bars, {}, { walk_forward: true, mode: 'windows' });
    // 99 days of data: 14-day test windows starting from day 30 up to day 85
    expect(result.windows).toHaveLength(56);
    expect(result.windows[0]?.equity_curve).toHaveLength(15);
    expect(result.train_metrics).toEqual(zero);
  });

  it('falls back to a single run when no window fits', () => {
    const result = validator.run(strategy, { AAPL: flatBars(10) }, {}, { walk_forward: true, mode: 'windows' });
    expect(result.windows).toHaveLength(1);
    expect(result.windows[0]?.equity_curve).toHaveLength(10);
  });

  it('rejects an invalid config', () => {
    expect(() => validator.run(strategy, bars, {}, { train_split: 2 })).toThrow(ConfigurationError);
  });
});
