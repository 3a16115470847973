/**
 * Data Quality Handler
 *
 * Pure handler - no console.log, no process.exit.
 */

import { DataQualityChecker } from '@stratgate/backtest';
import { DataQualityError } from '@stratgate/utils';
import type { QualityReport } from '@stratgate/core';
import type { QualityArgs } from '../../command-defs/strategy.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadRawBars } from '../../core/input-loader.js';

export interface QualityRow {
  symbol: string;
  status: QualityReport['status'];
  rows: number;
  errors: number;
  warnings: number;
  gaps: number;
  outliers: number;
}

export async function checkQualityHandler(
  args: QualityArgs,
  ctx: CommandContext
): Promise<Record<string, QualityReport>> {
  const checker = new DataQualityChecker({
    ...(args.gapDays !== undefined ? { gapThresholdDays: args.gapDays } : {}),
    ...(args.outlierPct !== undefined ? { outlierThresholdPct: args.outlierPct } : {}),
  });
  const raw = await loadRawBars(args.bars, ctx.readFile);

  const reports: Record<string, QualityReport> = {};
  for (const [symbol, bars] of Object.entries(raw)) {
    reports[symbol] = checker.validate(bars);
  }
  return reports;
}

export function summarizeQuality(reports: Record<string, QualityReport>): QualityRow[] {
  return Object.entries(reports).map(([symbol, report]) => ({
    symbol,
    status: report.status,
    rows: report.row_count,
    errors: report.issues.filter((issue) => issue.severity === 'error').length,
    warnings: report.issues.filter((issue) => issue.severity === 'warning').length,
    gaps: report.gaps.length,
    outliers: report.outliers.length,
  }));
}

/**
 * Throw when any symbol's report failed; warnings pass
 */
export function assertQualityPassed(reports: Record<string, QualityReport>): void {
  const failed = Object.entries(reports)
    .filter(([, report]) => report.status === 'fail')
    .map(([symbol]) => symbol);
  if (failed.length > 0) {
    throw new DataQualityError(`Data quality check failed for ${failed.join(', ')}`, 'fail', { symbols: failed });
  }
}
