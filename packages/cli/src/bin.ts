#!/usr/bin/env node
/**
 * cachesim binary entry point
 */

import { createProgram } from './index.js';
import { status } from './ui/spinner.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    status.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
