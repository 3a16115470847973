/**
 * Tests for data quality checks
 */

import { describe, it, expect } from 'vitest';
import type { BarInput } from '@stratgate/core';
import { DataQualityChecker, checkFreshness } from '../../src/integrity/data-quality.js';
import { DAY_MS, JAN_1_2024, dailyBars } from '../helpers/bars.js';

describe('DataQualityChecker', () => {
  const checker = new DataQualityChecker();

  it('passes a clean daily series', () => {
    const report = checker.validate(dailyBars([100, 101, 102, 101, 100]));

    expect(report.status).toBe('pass');
    expect(report.issues).toEqual([]);
    expect(report.checks_performed).toEqual([
      'missing_values',
      'ohlc_relationships',
      'duplicate_timestamps',
      'gaps',
      'outliers',
    ]);
    expect(report.recommendations).toEqual(['Data quality is good, no action needed']);
    expect(report.row_count).toBe(5);
  });

  it('fails empty input', () => {
    const report = checker.validate([]);
    expect(report.status).toBe('fail');
    expect(report.issues).toEqual([{ check: 'empty_data', severity: 'error', message: 'Data is empty' }]);
  });

  it('reports each missing field as an error', () => {
    const bars: BarInput[] = [
      { timestamp: JAN_1_2024, open: 1, high: 1, low: 1, close: 1, volume: 1 },
      { timestamp: JAN_1_2024 + DAY_MS, open: 1, high: 1, low: 1, close: null, volume: 1 },
      { timestamp: 'garbage', open: 1, high: 1, low: 1, close: 1 },
    ];
    const report = checker.validate(bars);

    expect(report.status).toBe('fail');
    expect(report.issues.filter((issue) => issue.check === 'missing_values').map((i) => i.message)).toEqual([
      'Missing close at index 1',
      'Missing timestamp at index 2',
      'Missing volume at index 2',
    ]);
  });

  it('reports every violated OHLC relationship', () => {
    const report = checker.validate([{ timestamp: JAN_1_2024, open: 10, high: 9, low: 11, close: 10, volume: 5 }]);

    expect(report.status).toBe('fail');
    expect(report.issues.map((issue) => issue.message)).toEqual([
      'High < Low at index 0',
      'High < Open at index 0',
      'High < Close at index 0',
      'Low > Open at index 0',
      'Low > Close at index 0',
    ]);
    expect(report.validation_errors[0]).toBe('Index 0: high (9) < low (11)');
    expect(report.recommendations).toEqual([
      'Found 5 validation errors - data may be corrupted',
      'Review 5 errors and 0 warnings before using data',
    ]);
  });

  it('warns on duplicate timestamps, including ISO and epoch forms of the same instant', () => {
    const report = checker.validate([
      { timestamp: '2024-01-01T00:00:00Z', open: 1, high: 1, low: 1, close: 1, volume: 1 },
      { timestamp: JAN_1_2024, open: 1, high: 1, low: 1, close: 1, volume: 1 },
    ]);

    expect(report.status).toBe('warning');
    expect(report.issues).toEqual([
      {
        check: 'duplicate_timestamps',
        severity: 'warning',
        message: 'Duplicate timestamp at index 1',
        index: 1,
        timestamp: JAN_1_2024,
      },
    ]);
  });

  it('warns on gaps longer than the threshold', () => {
    const bars = dailyBars([100, 100]);
    const late = dailyBars([100], JAN_1_2024 + 6 * DAY_MS);
    const report = checker.validate([...bars, ...late]);

    expect(report.status).toBe('warning');
    expect(report.gaps).toEqual([{ start: JAN_1_2024 + DAY_MS, end: JAN_1_2024 + 6 * DAY_MS, gap_days: 5 }]);
    expect(report.issues[0]?.message.startsWith('Gap of 5 days between 2024-01-02')).toBe(true);
    expect(report.recommendations).toEqual([
      'Found 1 gaps - consider filling missing data',
      'Review 0 errors and 1 warnings before using data',
    ]);
  });

  it('does not flag a gap equal to the threshold', () => {
    const report = new DataQualityChecker({ gapThresholdDays: 3 }).validate([
      ...dailyBars([100]),
      ...dailyBars([100], JAN_1_2024 + 3 * DAY_MS),
    ]);
    expect(report.gaps).toEqual([]);
  });

  it('flags large close-to-close moves', () => {
    const report = checker.validate(dailyBars([100, 100, 120]));

    expect(report.status).toBe('warning');
    expect(report.outliers).toHaveLength(1);
    expect(report.outliers[0]).toMatchObject({ index: 2, timestamp: JAN_1_2024 + 2 * DAY_MS, kind: 'price' });
    expect(report.outliers[0]?.value).toBeCloseTo(0.2, 10);
    expect(report.issues[0]?.message.startsWith('Large price change: 20.00% at 2024-01-03')).toBe(true);
  });

  it('flags volume spikes against the trailing five-bar mean', () => {
    const bars = dailyBars([100, 100, 100, 100, 100, 100]).map((bar, i) => ({
      ...bar,
      volume: i === 5 ? 1001 : 100,
    }));
    const report = checker.validate(bars);

    expect(report.outliers).toHaveLength(1);
    expect(report.outliers[0]?.kind).toBe('volume');
    expect(report.issues[0]?.message.startsWith('Unusual volume spike at 2024-01-06')).toBe(true);
  });

  it('ignores a volume of exactly ten times the mean', () => {
    const bars = dailyBars([100, 100, 100, 100, 100, 100]).map((bar, i) => ({
      ...bar,
      volume: i === 5 ? 1000 : 100,
    }));
    expect(checker.validate(bars).status).toBe('pass');
  });

  it('checks unsorted input in chronological order', () => {
    const [first, second, third] = dailyBars([100, 101, 102]);
    if (!first || !second || !third) throw new Error('fixture');
    expect(checker.validate([third, first, second]).status).toBe('pass');
  });
});

describe('checkFreshness', () => {
  const now = Date.UTC(2024, 5, 1, 12);

  it('treats data within the window as fresh', () => {
    const report = checkFreshness(now - 2 * 60 * 60 * 1000, 24, now);
    expect(report).toEqual({ is_fresh: true, age_hours: 2, max_age_hours: 24, message: 'Data is 2.0h old' });
  });

  it('flags stale data', () => {
    const report = checkFreshness(now - 30 * 60 * 60 * 1000, 24, now);
    expect(report.is_fresh).toBe(false);
    expect(report.message).toBe('Data is stale: 30.0h old (max 24h)');
  });
});
