#!/usr/bin/env node

/**
 * Rebalancer CLI Entry Point
 */

import { die, handleError } from '../core/error-handler.js';
import { createProgram } from '../program.js';

const program = createProgram({
  write: (text) => {
    process.stdout.write(text);
  },
  onError: die,
});

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(`Error: ${handleError(error)}\n`);
  process.exit(1);
});
