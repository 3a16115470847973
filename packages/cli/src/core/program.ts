/**
 * Program builder
 *
 * Builds the commander program with every command wired to a context.
 */

import { Command } from 'commander';
import { CommandContext } from './command-context.js';
import { registerStrategyCommands } from '../commands/strategy.js';
import { registerDataCommands } from '../commands/data.js';
import { registerScenarioCommands } from '../commands/scenarios.js';

export const CLI_VERSION = '0.1.0';

export function buildProgram(ctx: CommandContext = new CommandContext()): Command {
  const program = new Command();
  program
    .name('stratgate')
    .description('stratgate - strategy validation, risk gating and execution')
    .version(CLI_VERSION);

  registerStrategyCommands(program, ctx);
  registerDataCommands(program, ctx);
  registerScenarioCommands(program, ctx);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
