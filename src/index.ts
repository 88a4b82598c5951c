#!/usr/bin/env node
/**
 * ralph - autonomous agent loop.
 *
 * Entry point for the CLI.
 */

import 'dotenv/config';

import { createProgram } from './cli/program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
