#!/usr/bin/env node

/**
 * candlefold CLI entry point
 */

import { handleError } from '@candlefold/utils';
import { createProgram } from '../program.js';
import { exitCodeFor, formatError } from '../core/error-handler.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error: unknown) {
    handleError(error, { command: process.argv.slice(2).join(' ') });
    process.stderr.write(`Error: ${formatError(error)}\n`);
    process.exitCode = exitCodeFor(error);
  }
}

void main();
