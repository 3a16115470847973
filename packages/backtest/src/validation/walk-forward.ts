/**
 * Walk-Forward Validation
 *
 * Chronological train/validation/holdout splits and walk-forward windows for
 * out-of-sample evaluation. Bars are never shuffled.
 *
 * Aggregate metrics are the unweighted mean of the per-split or per-window
 * metrics, regardless of how many bars each covers.
 */

import { DateTime } from 'luxon';
import { z } from 'zod';
import { ConfigurationError, createLogger } from '@stratgate/utils';
import {
  ZERO_METRICS,
  type BacktestMetrics,
  type BacktestResult,
  type BarsBySymbol,
  type StrategySpec,
  type TransactionCosts,
  type WalkForwardResult,
} from '@stratgate/core';
import { Backtester } from '../engine/backtester.js';

const logger = createLogger('backtest:walk-forward');

const SPLIT_TOLERANCE = 0.01;
const MIN_TRAIN_DAYS = 30;

// =============================================================================
// Types
// =============================================================================

export const ValidationConfigSchema = z.object({
  train_split: z.number().min(0).max(1).default(0.7),
  validation_split: z.number().min(0).max(1).default(0.15),
  holdout_split: z.number().min(0).max(1).default(0.15),
  walk_forward: z.boolean().default(false),
  /** 'split': one backtest per split; 'windows': one backtest per walk-forward test window */
  mode: z.enum(['split', 'windows']).default('split'),
  window_size_days: z.number().int().positive().optional(),
  expanding: z.boolean().default(true),
  step_size_days: z.number().int().positive().default(1),
  test_window_days: z.number().int().positive().optional(),
});

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type ValidationConfigInput = z.input<typeof ValidationConfigSchema>;

export interface SplitFractions {
  train: number;
  validation: number;
  holdout: number;
}

export interface DataSplits {
  train: BarsBySymbol;
  validation: BarsBySymbol;
  holdout: BarsBySymbol;
}

export interface WindowOptions {
  /** Rolling train length in days (default: 70% of the range) */
  windowSizeDays?: number;
  expanding?: boolean;
  stepSizeDays?: number;
  testWindowDays?: number;
}

/** [trainStart, trainEnd, testStart, testEnd] */
export type WalkForwardWindow = [DateTime, DateTime, DateTime, DateTime];

// =============================================================================
// Splitting
// =============================================================================

/**
 * Partition each symbol's bars chronologically into train/validation/holdout
 */
export function splitData(barsBySymbol: BarsBySymbol, fractions: SplitFractions): DataSplits {
  const { train, validation, holdout } = fractions;
  if (train < 0 || validation < 0 || holdout < 0) {
    throw new ConfigurationError('Split fractions must be non-negative', 'split', { ...fractions });
  }
  const total = train + validation + holdout;
  if (Math.abs(total - 1) > SPLIT_TOLERANCE) {
    throw new ConfigurationError(`Splits must sum to 1.0, got ${total}`, 'split', { ...fractions });
  }

  const splits: DataSplits = { train: {}, validation: {}, holdout: {} };

  for (const [symbol, bars] of Object.entries(barsBySymbol)) {
    if (bars.length === 0) continue;

    const sorted = [...bars].sort((a, b) => a.timestamp - b.timestamp);
    const trainEnd = Math.floor(sorted.length * train);
    const validationEnd = Math.floor(sorted.length * (train + validation));

    splits.train[symbol] = sorted.slice(0, trainEnd);
    splits.validation[symbol] = sorted.slice(trainEnd, validationEnd);
    splits.holdout[symbol] = sorted.slice(validationEnd);

    logger.debug('Split symbol bars', {
      symbol,
      train: trainEnd,
      validation: validationEnd - trainEnd,
      holdout: sorted.length - validationEnd,
    });
  }

  return splits;
}

// =============================================================================
// Windows
// =============================================================================

/**
 * Generate walk-forward windows between two dates.
 *
 * Expanding windows anchor training at `start`; rolling windows keep a fixed
 * training length and never reach back before `start`. Windows with less than
 * 30 days of training are skipped.
 */
export function createWindows(
  start: DateTime,
  end: DateTime,
  options: WindowOptions = {}
): WalkForwardWindow[] {
  const expanding = options.expanding ?? true;
  const stepSizeDays = options.stepSizeDays ?? 1;
  if (stepSizeDays <= 0) {
    throw new ConfigurationError('stepSizeDays must be positive', 'step_size_days');
  }

  const totalDays = Math.floor(end.diff(start, 'days').days);
  if (totalDays < MIN_TRAIN_DAYS) {
    logger.warn('Date range is very short, may not generate useful windows', { totalDays });
  }

  const trainDays = Math.max(options.windowSizeDays ?? Math.floor(totalDays * 0.7), MIN_TRAIN_DAYS);
  const testDays = options.testWindowDays ?? Math.max(Math.floor(totalDays * 0.15), 10);

  const windows: WalkForwardWindow[] = [];
  const startMs = start.toMillis();
  const endMs = end.toMillis();
  let testStart = start;

  while (testStart.toMillis() < endMs) {
    const trainStart = expanding ? start : testStart.minus({ days: trainDays });
    const trainEnd = testStart;
    const candidateEnd = testStart.plus({ days: testDays });
    const testEnd = candidateEnd.toMillis() < endMs ? candidateEnd : end;

    const trainLengthDays = trainEnd.diff(trainStart, 'days').days;
    if (trainLengthDays <= 0 || trainLengthDays < MIN_TRAIN_DAYS || trainStart.toMillis() < startMs) {
      testStart = testStart.plus({ days: stepSizeDays });
      continue;
    }
    if (testEnd.toMillis() <= testStart.toMillis()) break;

    windows.push([trainStart, trainEnd, testStart, testEnd]);
    if (testEnd.toMillis() >= endMs) break;
    testStart = testStart.plus({ days: stepSizeDays });
  }

  logger.info('Generated walk-forward windows', { count: windows.length, expanding });
  return windows;
}

/**
 * Bars within [from, to] (epoch ms, inclusive); symbols left empty are dropped
 */
export function sliceBars(barsBySymbol: BarsBySymbol, from: number, to: number): BarsBySymbol {
  const sliced: BarsBySymbol = {};
  for (const [symbol, bars] of Object.entries(barsBySymbol)) {
    const inRange = bars.filter((bar) => bar.timestamp >= from && bar.timestamp <= to);
    if (inRange.length > 0) sliced[symbol] = inRange;
  }
  return sliced;
}

// =============================================================================
// Aggregation
// =============================================================================

export function aggregateMetrics(results: BacktestResult[]): BacktestMetrics {
  if (results.length === 0) return { ...ZERO_METRICS };
  const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;
  return {
    sharpe: mean(results.map((r) => r.metrics.sharpe)),
    max_drawdown: mean(results.map((r) => r.metrics.max_drawdown)),
    total_return: mean(results.map((r) => r.metrics.total_return ?? 0)),
  };
}

function dataRange(barsBySymbol: BarsBySymbol): [number, number] | undefined {
  let range: [number, number] | undefined;
  for (const bars of Object.values(barsBySymbol)) {
    for (const bar of bars) {
      range = range
        ? [Math.min(range[0], bar.timestamp), Math.max(range[1], bar.timestamp)]
        : [bar.timestamp, bar.timestamp];
    }
  }
  return range;
}

// =============================================================================
// Validator
// =============================================================================

export class WalkForwardValidator {
  constructor(private readonly backtester: Backtester = new Backtester()) {}

  run(
    strategy: StrategySpec,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts> = {},
    configInput: ValidationConfigInput = {}
  ): WalkForwardResult {
    const parsed = ValidationConfigSchema.safeParse(configInput);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid validation config: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        'validation'
      );
    }
    const config = parsed.data;

    if (!config.walk_forward) {
      return this.singleRun(strategy, barsBySymbol, costs);
    }
    if (config.mode === 'split') {
      return this.runSplits(strategy, barsBySymbol, costs, config);
    }
    return this.runWindows(strategy, barsBySymbol, costs, config);
  }

  private singleRun(
    strategy: StrategySpec,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts>
  ): WalkForwardResult {
    const result = this.backtester.run(strategy, barsBySymbol, costs);
    return {
      windows: [result],
      aggregate_metrics: result.metrics,
      train_metrics: result.metrics,
      validation_metrics: result.metrics,
    };
  }

  private runSplits(
    strategy: StrategySpec,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts>,
    config: ValidationConfig
  ): WalkForwardResult {
    const splits = splitData(barsBySymbol, {
      train: config.train_split,
      validation: config.validation_split,
      holdout: config.holdout_split,
    });

    const train = this.backtester.run(strategy, splits.train, costs);
    const validation = this.backtester.run(strategy, splits.validation, costs);
    const holdout =
      config.holdout_split > 0 ? this.backtester.run(strategy, splits.holdout, costs) : undefined;

    // One entry per split, in order; the aggregate averages exactly these
    const windows = holdout ? [train, validation, holdout] : [train, validation];
    return {
      windows,
      aggregate_metrics: aggregateMetrics(windows),
      train_metrics: train.metrics,
      validation_metrics: validation.metrics,
      ...(holdout ? { holdout_metrics: holdout.metrics } : {}),
    };
  }

  private runWindows(
    strategy: StrategySpec,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts>,
    config: ValidationConfig
  ): WalkForwardResult {
    const range = dataRange(barsBySymbol);
    if (!range) {
      logger.warn('No timestamps in data, falling back to single backtest');
      return this.singleRun(strategy, barsBySymbol, costs);
    }

    const windows = createWindows(
      DateTime.fromMillis(range[0], { zone: 'utc' }),
      DateTime.fromMillis(range[1], { zone: 'utc' }),
      {
        windowSizeDays: config.window_size_days,
        expanding: config.expanding,
        stepSizeDays: config.step_size_days,
        testWindowDays: config.test_window_days,
      }
    );

    const results: BacktestResult[] = [];
    for (const [, , testStart, testEnd] of windows) {
      const testData = sliceBars(barsBySymbol, testStart.toMillis(), testEnd.toMillis());
      if (Object.keys(testData).length > 0) {
        results.push(this.backtester.run(strategy, testData, costs));
      }
    }

    const first = results[0];
    const last = results[results.length - 1];
    if (!first || !last) {
      logger.warn('No walk-forward windows generated, falling back to single backtest');
      return this.singleRun(strategy, barsBySymbol, costs);
    }

    return {
      windows: results,
      aggregate_metrics: aggregateMetrics(results),
      train_metrics: first.metrics,
      validation_metrics: last.metrics,
    };
  }
}
