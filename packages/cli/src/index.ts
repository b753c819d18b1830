/**
 * cachesim-cli
 *
 * Command-line front end for the cache hierarchy simulator.
 */

import { Command } from 'commander';

import { createRunCommand } from './commands/run.js';
import { createValidateCommand } from './commands/validate.js';

export const VERSION = '1.0.0';

/**
 * Build the cachesim program with every command registered
 */
export function createProgram(): Command {
  return new Command()
    .name('cachesim')
    .description('Two-level set-associative cache simulator')
    .version(VERSION)
    .addCommand(createRunCommand())
    .addCommand(createValidateCommand());
}

export { EXIT_CODES, reportFailure, type RunOptions } from './commands/run.js';
export { type ValidateOptions } from './commands/validate.js';
export * from './config/types.js';
export { DEFAULT_SETTINGS } from './config/defaults.js';
export * from './config/settings-loader.js';
export * from './config/settings-validator.js';
export * from './output/index.js';
