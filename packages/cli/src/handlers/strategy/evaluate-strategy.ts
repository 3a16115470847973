/**
 * Evaluate Strategy Handler
 *
 * Runs the full pipeline for one strategy file against one bars file.
 *
 * Pure handler - no console.log, no process.exit.
 */

import type { CandidateResult } from '@stratgate/core';
import type { PipelineOptions } from '@stratgate/workflows';
import type { EvaluateArgs } from '../../command-defs/strategy.js';
import type { CommandContext } from '../../core/command-context.js';
import { cashPortfolio, loadRawBars, loadStrategy, toBarsBySymbol } from '../../core/input-loader.js';
import { listScenarios } from '@stratgate/backtest';

export async function evaluateStrategyHandler(args: EvaluateArgs, ctx: CommandContext): Promise<CandidateResult> {
  const strategy = await loadStrategy(args.strategy, ctx.readFile);
  const raw = await loadRawBars(args.bars, ctx.readFile);
  const bars = toBarsBySymbol(raw);

  const options: PipelineOptions = {
    rawBars: raw,
    requireGatingPass: args.requireGatingPass,
    ...(args.walkForward ? { validation: { walk_forward: true, mode: args.mode } } : {}),
    ...(args.gating ? { gating: { scenarios: listScenarios(args.tags) } } : {}),
  };

  return ctx.pipeline(args.outDir).evaluateAndExecute(strategy, bars, cashPortfolio(args.cash), args.execute, options);
}

/**
 * One row per headline figure, for table output
 */
export function summarizeCandidate(result: CandidateResult): Array<{ field: string; value: unknown }> {
  const rows: Array<{ field: string; value: unknown }> = [
    { field: 'run_id', value: result.run_id },
    { field: 'strategy', value: result.strategy.strategy_id },
    ...Object.entries(result.data_quality).map(([symbol, report]) => ({
      field: `quality.${symbol}`,
      value: report.status,
    })),
    { field: 'backtest.sharpe', value: result.backtest.metrics.sharpe },
    { field: 'backtest.max_drawdown', value: result.backtest.metrics.max_drawdown },
    { field: 'backtest.total_return', value: result.backtest.metrics.total_return },
    { field: 'backtest.trades', value: result.backtest.trade_log.length },
  ];

  if (result.validation) {
    rows.push({ field: 'validation.sharpe', value: result.validation.aggregate_metrics.sharpe });
  }
  if (result.gating) {
    rows.push({ field: 'gating.passed', value: result.gating.overall_passed });
  }
  rows.push(
    { field: 'orders.proposed', value: result.proposed_orders.length },
    { field: 'orders.approved', value: result.risk.approved_trades.length },
    { field: 'risk.level', value: result.risk.risk_level },
    { field: 'risk.score', value: result.risk.risk_score },
    { field: 'fills', value: result.execution_fills.length }
  );
  for (const violation of result.risk.violations) {
    rows.push({ field: 'risk.violation', value: violation });
  }
  if (result.execution_error !== undefined) {
    rows.push({ field: 'execution_error', value: result.execution_error });
  }
  for (const stageError of result.stage_errors) {
    rows.push({ field: `error.${stageError.stage}`, value: stageError.error });
  }
  return rows;
}
