/**
 * Data commands: quality
 */

import type { Command } from 'commander';
import { qualitySchema } from '../command-defs/strategy.js';
import type { CommandContext } from '../core/command-context.js';
import { validateArgs } from '../core/coerce.js';
import { formatOutput } from '../core/output-formatter.js';
import { assertQualityPassed, checkQualityHandler, summarizeQuality } from '../handlers/data/check-quality.js';

export function registerDataCommands(program: Command, ctx: CommandContext): void {
  program
    .command('quality')
    .description('Run data-quality checks on every symbol in a bars file')
    .requiredOption('--bars <file>', 'Bars JSON file ({ "SYMBOL": [bar, ...] })')
    .option('--gap-days <days>', 'Gap threshold in days')
    .option('--outlier-pct <fraction>', 'Outlier threshold (0.1 = 10%)')
    .option('--strict', 'Exit with an error when any symbol fails')
    .option('--format <format>', 'Output format (json|table)', 'json')
    .action(async (opts: unknown) => {
      const args = validateArgs(qualitySchema, opts, 'quality');
      const reports = await checkQualityHandler(args, ctx);
      ctx.write(formatOutput(args.format === 'table' ? summarizeQuality(reports) : reports, args.format));
      if (args.strict) assertQualityPassed(reports);
    });
}
