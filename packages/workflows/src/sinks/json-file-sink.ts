/**
 * JSON File Sink
 * ==============
 * Writes each candidate result to `<directory>/<run_id>.json`.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { createLogger } from '@stratgate/utils';
import type { CandidateResult, ResultSinkPort } from '@stratgate/core';

const logger = createLogger('workflows:json-sink');

export class JsonFileResultSink implements ResultSinkPort {
  constructor(private readonly directory: string) {}

  async save(result: CandidateResult): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, `${result.run_id}.json`);
    await writeFile(path, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
    logger.info('Saved candidate result', { runId: result.run_id, path });
  }
}
