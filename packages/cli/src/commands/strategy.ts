/**
 * Strategy commands: evaluate
 */

import type { Command } from 'commander';
import { evaluateSchema } from '../command-defs/strategy.js';
import type { CommandContext } from '../core/command-context.js';
import { validateArgs } from '../core/coerce.js';
import { formatOutput } from '../core/output-formatter.js';
import { evaluateStrategyHandler, summarizeCandidate } from '../handlers/strategy/evaluate-strategy.js';

export function registerStrategyCommands(program: Command, ctx: CommandContext): void {
  program
    .command('evaluate')
    .description('Validate, gate and risk-check a strategy; optionally execute approved orders')
    .requiredOption('--strategy <file>', 'Strategy spec JSON file')
    .requiredOption('--bars <file>', 'Bars JSON file ({ "SYMBOL": [bar, ...] })')
    .option('--cash <amount>', 'Starting cash for the synthetic portfolio', '100000')
    .option('--execute', 'Submit approved orders to the broker', false)
    .option('--walk-forward', 'Run walk-forward validation', false)
    .option('--mode <mode>', 'Walk-forward mode: split or windows', 'split')
    .option('--gating', 'Run crisis scenario gating', false)
    .option('--tags <tags>', 'Only gate on scenarios carrying every tag (comma-separated)')
    .option('--no-require-gating-pass', 'Execute even when gating fails')
    .option('--out-dir <dir>', 'Write the result JSON to this directory')
    .option('--format <format>', 'Output format (json|table)', 'json')
    .action(async (opts: unknown) => {
      const args = validateArgs(evaluateSchema, opts, 'evaluate');
      const result = await evaluateStrategyHandler(args, ctx);
      ctx.write(formatOutput(args.format === 'table' ? summarizeCandidate(result) : result, args.format));
    });
}
