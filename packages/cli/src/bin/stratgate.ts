#!/usr/bin/env node

/**
 * stratgate CLI Entry Point
 */

import 'dotenv/config';
import { buildProgram } from '../core/program.js';
import { exitCodeFor, handleError } from '../core/error-handler.js';

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = exitCodeFor(error);
  }
}

void main();
