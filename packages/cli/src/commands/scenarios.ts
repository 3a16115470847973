/**
 * Scenario commands: scenarios
 */

import type { Command } from 'commander';
import { scenariosSchema } from '../command-defs/strategy.js';
import type { CommandContext } from '../core/command-context.js';
import { validateArgs } from '../core/coerce.js';
import { formatOutput } from '../core/output-formatter.js';
import { listScenariosHandler } from '../handlers/scenarios/list-scenarios.js';

export function registerScenarioCommands(program: Command, ctx: CommandContext): void {
  program
    .command('scenarios')
    .description('List crisis scenarios used for gating')
    .option('--tags <tags>', 'Only scenarios carrying every tag (comma-separated)')
    .option('--format <format>', 'Output format (json|table)', 'json')
    .action((opts: unknown) => {
      const args = validateArgs(scenariosSchema, opts, 'scenarios');
      ctx.write(formatOutput(listScenariosHandler(args), args.format));
    });
}
