/**
 * Command Context - Lazy service creation
 *
 * Just an object that knows how to create the services commands need.
 * Tests pass overrides instead of touching the filesystem or a broker.
 */

import { readFile } from 'fs/promises';
import { StrategyPipeline, JsonFileResultSink } from '@stratgate/workflows';
import type { ReadTextFile } from './input-loader.js';

export interface CommandContextOptions {
  /** Override file reads (for testing) */
  readFileOverride?: ReadTextFile;
  /** Override pipeline construction (for testing); receives the sink directory when one is requested */
  pipelineFactory?: (outDir?: string) => StrategyPipeline;
  /** Override where formatted output goes (for testing) */
  writeOverride?: (text: string) => void;
}

const readUtf8: ReadTextFile = (path) => readFile(path, 'utf8');

export class CommandContext {
  private readonly options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this.options = options;
  }

  get readFile(): ReadTextFile {
    return this.options.readFileOverride ?? readUtf8;
  }

  write(text: string): void {
    if (this.options.writeOverride) {
      this.options.writeOverride(text);
      return;
    }
    process.stdout.write(`${text}\n`);
  }

  /**
   * A pipeline on the process-wide kill switch, run registry and broker manager
   */
  pipeline(outDir?: string): StrategyPipeline {
    if (this.options.pipelineFactory) {
      return this.options.pipelineFactory(outDir);
    }
    return new StrategyPipeline(outDir ? { sink: new JsonFileResultSink(outDir) } : {});
  }
}
