/**
 * CLI test wiring: fixture paths, captured output and a paper-broker pipeline
 */

import { fileURLToPath } from 'url';
import { ActiveRunRegistry, KillSwitch } from '@stratgate/core';
import { BrokerManager, BrokerRegistry, ExecutionGuard, PaperBroker, RiskEngine } from '@stratgate/trading';
import { StrategyPipeline } from '@stratgate/workflows';
import { CommandContext } from '../../src/core/command-context.js';
import type { ReadTextFile } from '../../src/core/input-loader.js';

export const FILL_TIME = Date.UTC(2024, 1, 1);

export function fixture(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

/**
 * readFile over an in-memory map; unknown paths reject like a missing file
 */
export function memoryFiles(files: Record<string, string>): ReadTextFile {
  return async (path) => {
    const content = files[path];
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return content;
  };
}

export interface TestContext {
  ctx: CommandContext;
  output: string[];
  broker: PaperBroker;
  outDirs: Array<string | undefined>;
}

export function createTestContext(options: { env?: string; readFile?: ReadTextFile } = {}): TestContext {
  const output: string[] = [];
  const outDirs: Array<string | undefined> = [];
  const broker = new PaperBroker({ name: 'paper', quotes: { AAPL: 100 }, now: () => FILL_TIME });

  const ctx = new CommandContext({
    ...(options.readFile ? { readFileOverride: options.readFile } : {}),
    writeOverride: (text) => {
      output.push(text);
    },
    pipelineFactory: (outDir) => {
      outDirs.push(outDir);
      return new StrategyPipeline({
        riskEngine: new RiskEngine({
          maxTradeNotional: 10000,
          maxPortfolioExposure: 0.5,
          maxPositionPerSymbol: 0.25,
          maxDrawdownThreshold: 0.25,
          blacklist: [],
          fallbackReferencePrice: 100,
          warningScore: 0.7,
        }),
        executionGuard: new ExecutionGuard({ env: options.env ?? 'production', allowNonProdExecution: false }),
        brokerManager: new BrokerManager({
          settings: {
            primary: 'paper',
            failoverEnabled: false,
            failoverList: [],
            healthCheckTimeoutMs: 20,
            fillTimeoutMs: 100,
            fillPollIntervalMs: 10,
          },
          registry: new BrokerRegistry().register('paper', () => broker),
        }),
        killSwitch: new KillSwitch(),
        activeRuns: new ActiveRunRegistry(),
      });
    },
  });

  return { ctx, output, broker, outDirs };
}
