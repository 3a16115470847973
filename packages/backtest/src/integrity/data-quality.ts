/**
 * Data Quality Checks
 *
 * Advisory screening of raw OHLCV bars before a backtest:
 * - Missing values
 * - OHLC relationship violations
 * - Duplicate timestamps
 * - Calendar gaps
 * - Price and volume outliers
 *
 * Checks run independently and accumulate issues; nothing here throws on bad data.
 */

import { DateTime } from 'luxon';
import { createLogger } from '@stratgate/utils';
import {
  parseTimestamp,
  type BarInput,
  type DataGap,
  type DataOutlier,
  type FreshnessReport,
  type QualityCheckName,
  type QualityIssue,
  type QualityReport,
  type QualitySeverity,
} from '@stratgate/core';

const logger = createLogger('backtest:data-quality');

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const VOLUME_LOOKBACK = 5;
const VOLUME_SPIKE_MULTIPLE = 10;

const REQUIRED_FIELDS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

export interface DataQualityConfig {
  /** Whole-day gap between consecutive bars above which a warning is raised */
  gapThresholdDays?: number;
  /** Absolute close-to-close change above which a bar is an outlier (0.10 = 10%) */
  outlierThresholdPct?: number;
}

interface IndexedBar {
  index: number;
  timestamp: number;
  close?: number;
  volume?: number;
}

function formatTimestamp(timestamp: number): string {
  return DateTime.fromMillis(timestamp, { zone: 'utc' }).toISO() ?? String(timestamp);
}

function numeric(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

class ReportBuilder {
  readonly checksPerformed: QualityCheckName[] = [];
  readonly issues: QualityIssue[] = [];
  readonly gaps: DataGap[] = [];
  readonly outliers: DataOutlier[] = [];
  readonly validationErrors: string[] = [];

  add(
    severity: QualitySeverity,
    check: QualityCheckName,
    message: string,
    location: { index?: number; timestamp?: number } = {}
  ): void {
    this.issues.push({ check, severity, message, ...location });
  }

  build(rowCount: number): QualityReport {
    const errorCount = this.issues.filter((issue) => issue.severity === 'error').length;
    const warningCount = this.issues.length - errorCount;
    const status = errorCount > 0 ? 'fail' : warningCount > 0 ? 'warning' : 'pass';

    const recommendations: string[] = [];
    if (status === 'pass') {
      recommendations.push('Data quality is good, no action needed');
    } else {
      if (this.gaps.length > 0) {
        recommendations.push(`Found ${this.gaps.length} gaps - consider filling missing data`);
      }
      if (this.outliers.length > 0) {
        recommendations.push(`Found ${this.outliers.length} outliers - verify data source accuracy`);
      }
      if (this.validationErrors.length > 0) {
        recommendations.push(
          `Found ${this.validationErrors.length} validation errors - data may be corrupted`
        );
      }
      recommendations.push(`Review ${errorCount} errors and ${warningCount} warnings before using data`);
    }

    return {
      status,
      row_count: rowCount,
      checks_performed: [...this.checksPerformed],
      issues: [...this.issues],
      gaps: [...this.gaps],
      outliers: [...this.outliers],
      validation_errors: [...this.validationErrors],
      recommendations,
    };
  }
}

export class DataQualityChecker {
  readonly gapThresholdDays: number;
  readonly outlierThresholdPct: number;

  constructor(config: DataQualityConfig = {}) {
    this.gapThresholdDays = config.gapThresholdDays ?? 3;
    this.outlierThresholdPct = config.outlierThresholdPct ?? 0.1;
  }

  /**
   * Run every check over the bars and summarise them in a report
   */
  validate(bars: BarInput[]): QualityReport {
    const report = new ReportBuilder();

    if (bars.length === 0) {
      report.add('error', 'empty_data', 'Data is empty');
      return report.build(0);
    }

    this.checkMissingValues(bars, report);
    this.checkOhlcRelationships(bars, report);
    this.checkDuplicateTimestamps(bars, report);

    // Gap and outlier checks work on the chronologically sorted, timestamped rows
    const sorted = bars
      .map((bar, index): IndexedBar | undefined => {
        const timestamp = parseTimestamp(bar.timestamp);
        return timestamp === undefined
          ? undefined
          : { index, timestamp, close: numeric(bar.close), volume: numeric(bar.volume) };
      })
      .filter((bar): bar is IndexedBar => bar !== undefined)
      .sort((a, b) => a.timestamp - b.timestamp);

    this.checkGaps(sorted, report);
    this.checkOutliers(sorted, report);

    const result = report.build(bars.length);
    logger.debug('Data quality check complete', {
      status: result.status,
      rows: bars.length,
      issues: result.issues.length,
    });
    return result;
  }

  private checkMissingValues(bars: BarInput[], report: ReportBuilder): void {
    report.checksPerformed.push('missing_values');

    bars.forEach((bar, index) => {
      for (const field of REQUIRED_FIELDS) {
        const value = bar[field];
        const missing =
          value === undefined ||
          value === null ||
          (field === 'timestamp' ? parseTimestamp(value) === undefined : !Number.isFinite(value));
        if (missing) {
          report.add('error', 'missing_values', `Missing ${field} at index ${index}`, { index });
        }
      }
    });
  }

  private checkOhlcRelationships(bars: BarInput[], report: ReportBuilder): void {
    report.checksPerformed.push('ohlc_relationships');

    bars.forEach((bar, index) => {
      const open = numeric(bar.open);
      const high = numeric(bar.high);
      const low = numeric(bar.low);
      const close = numeric(bar.close);
      // Incomplete rows are already reported as missing values
      if (open === undefined || high === undefined || low === undefined || close === undefined) {
        return;
      }

      const violations: Array<[boolean, string, string]> = [
        [high < low, 'High < Low', `high (${high}) < low (${low})`],
        [high < open, 'High < Open', `high (${high}) < open (${open})`],
        [high < close, 'High < Close', `high (${high}) < close (${close})`],
        [low > open, 'Low > Open', `low (${low}) > open (${open})`],
        [low > close, 'Low > Close', `low (${low}) > close (${close})`],
      ];

      for (const [violated, label, detail] of violations) {
        if (violated) {
          report.validationErrors.push(`Index ${index}: ${detail}`);
          report.add('error', 'ohlc_relationships', `${label} at index ${index}`, { index });
        }
      }
    });
  }

  private checkDuplicateTimestamps(bars: BarInput[], report: ReportBuilder): void {
    report.checksPerformed.push('duplicate_timestamps');

    const seen = new Map<string, number>();
    bars.forEach((bar, index) => {
      if (bar.timestamp === undefined || bar.timestamp === null || bar.timestamp === '') {
        return;
      }
      const parsed = parseTimestamp(bar.timestamp);
      const key = parsed === undefined ? String(bar.timestamp) : String(parsed);
      if (seen.has(key)) {
        report.add('warning', 'duplicate_timestamps', `Duplicate timestamp at index ${index}`, {
          index,
          timestamp: parsed,
        });
      } else {
        seen.set(key, index);
      }
    });
  }

  private checkGaps(sorted: IndexedBar[], report: ReportBuilder): void {
    report.checksPerformed.push('gaps');

    for (let i = 0; i < sorted.length - 1; i++) {
      const current = sorted[i];
      const next = sorted[i + 1];
      if (!current || !next) continue;

      const gapDays = Math.floor((next.timestamp - current.timestamp) / DAY_MS);
      if (gapDays > this.gapThresholdDays) {
        report.gaps.push({ start: current.timestamp, end: next.timestamp, gap_days: gapDays });
        report.add(
          'warning',
          'gaps',
          `Gap of ${gapDays} days between ${formatTimestamp(current.timestamp)} and ${formatTimestamp(next.timestamp)}`,
          { index: next.index, timestamp: next.timestamp }
        );
      }
    }
  }

  private checkOutliers(sorted: IndexedBar[], report: ReportBuilder): void {
    report.checksPerformed.push('outliers');

    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1];
      const current = sorted[i];
      if (!previous || !current) continue;

      if (previous.close !== undefined && current.close !== undefined && previous.close > 0) {
        const pctChange = Math.abs(current.close / previous.close - 1);
        if (pctChange > this.outlierThresholdPct) {
          report.outliers.push({
            index: current.index,
            timestamp: current.timestamp,
            kind: 'price',
            value: pctChange,
          });
          report.add(
            'warning',
            'outliers',
            `Large price change: ${(pctChange * 100).toFixed(2)}% at ${formatTimestamp(current.timestamp)}`,
            { index: current.index, timestamp: current.timestamp }
          );
        }
      }

      if (i >= VOLUME_LOOKBACK && current.volume !== undefined) {
        const window = sorted.slice(i - VOLUME_LOOKBACK, i);
        const avgVolume = window.reduce((sum, bar) => sum + (bar.volume ?? 0), 0) / window.length;
        if (avgVolume > 0 && current.volume > avgVolume * VOLUME_SPIKE_MULTIPLE) {
          report.outliers.push({
            index: current.index,
            timestamp: current.timestamp,
            kind: 'volume',
            value: current.volume / avgVolume,
          });
          report.add(
            'warning',
            'outliers',
            `Unusual volume spike at ${formatTimestamp(current.timestamp)}`,
            { index: current.index, timestamp: current.timestamp }
          );
        }
      }
    }
  }
}

/**
 * Report whether data last updated at `lastUpdated` (epoch ms) is still fresh
 */
export function checkFreshness(
  lastUpdated: number,
  maxAgeHours: number = 24,
  now: number = Date.now()
): FreshnessReport {
  const ageHours = Math.max(0, (now - lastUpdated) / HOUR_MS);
  const isFresh = ageHours <= maxAgeHours;
  return {
    is_fresh: isFresh,
    age_hours: ageHours,
    max_age_hours: maxAgeHours,
    message: isFresh
      ? `Data is ${ageHours.toFixed(1)}h old`
      : `Data is stale: ${ageHours.toFixed(1)}h old (max ${maxAgeHours}h)`,
  };
}
