/**
 * Run Command - cachesim run <config> -t <trace>
 *
 * Simulate a trace against a cache hierarchy, stream the event log and
 * print the end-of-run summary.
 */

import chalk from 'chalk';
import { Command, Option } from 'commander';

import {
  AccessSimulator,
  CacheHierarchy,
  ConfigError,
  InputLoadError,
  InvariantViolation,
  TraceError,
  describeGeometry,
  loadCacheConfig,
  loadTrace,
  type AccessLogEntry,
  type AccessRecord,
  type CacheConfig,
} from 'cachesim-core';

import { loadSettings, mergeSettings } from '../config/settings-loader.js';
import {
  SettingsValidationException,
  isAddressFormat,
  isOutputFormat,
} from '../config/settings-validator.js';
import {
  OUTPUT_FORMATS,
  formatAccessLogEntry,
  formatJson,
  formatSummary,
} from '../output/index.js';
import { createSpinner, status } from '../ui/spinner.js';

import type { CliSettings, PartialCliSettings } from '../config/types.js';

export interface RunOptions {
  /** Trace file path */
  trace: string;
  /** Output format */
  format?: string;
  /** Address format for the event log */
  addressFormat?: string;
  /** Print the summary (undefined leaves the setting alone) */
  stats?: boolean;
  /** Check hierarchy invariants after every access */
  checkInvariants?: boolean;
  /** Suppress the event log */
  quiet?: boolean;
  /** Enable verbose output */
  verbose?: boolean;
}

/** Exit codes by failure kind */
export const EXIT_CODES = {
  input: 1,
  settings: 2,
  invariant: 3,
} as const;

/**
 * Settings fragment from command-line flags
 */
function flagSettings(options: RunOptions): PartialCliSettings {
  const output: NonNullable<PartialCliSettings['output']> = {};
  if (isOutputFormat(options.format)) {output.format = options.format;}
  if (isAddressFormat(options.addressFormat)) {output.addressFormat = options.addressFormat;}
  if (options.stats !== undefined) {output.stats = options.stats;}

  const simulation: NonNullable<PartialCliSettings['simulation']> = {};
  if (options.checkInvariants) {simulation.verifyInvariants = true;}

  return { output, simulation };
}

function write(text: string): void {
  process.stdout.write(text);
}

function describeLevels(configs: readonly CacheConfig[]): void {
  for (const config of configs) {
    const geometry = describeGeometry(config);
    status.info(
      `${geometry.name}: ${geometry.size} bytes, ${geometry.sets} sets x ${geometry.ways} ways, ` +
        `${geometry.blockSize}-byte blocks, ${geometry.policy}`
    );
  }
}

/**
 * Report a failure and set the exit code. Unknown errors propagate.
 */
export function reportFailure(error: unknown, verbose: boolean): void {
  if (error instanceof SettingsValidationException) {
    status.error(error.message);
    console.error(error.formatErrors());
    process.exitCode = EXIT_CODES.settings;
    return;
  }
  if (error instanceof ConfigError || error instanceof TraceError) {
    status.error(`${error.name}: ${error.message}`);
    process.exitCode = EXIT_CODES.input;
    return;
  }
  if (error instanceof InputLoadError) {
    status.error(error.message);
    if (verbose && error.errorCause) {
      console.error(chalk.gray(`  ${error.errorCause.message}`));
    }
    process.exitCode = EXIT_CODES.input;
    return;
  }
  if (error instanceof InvariantViolation) {
    status.error(`Invariant violated: ${error.message}`);
    if (verbose && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exitCode = EXIT_CODES.invariant;
    return;
  }
  throw error;
}

/**
 * Simulate with resolved settings
 */
async function simulateRun(
  configPath: string,
  options: RunOptions,
  settings: CliSettings
): Promise<void> {
  const { format, addressFormat, stats } = settings.output;
  const quiet = options.quiet ?? false;
  const verbose = options.verbose ?? false;

  const spinner = format === 'text' && !quiet ? createSpinner('Loading configuration and trace...') : null;
  spinner?.start();

  let configs: CacheConfig[];
  let records: AccessRecord[];
  try {
    [configs, records] = await Promise.all([loadCacheConfig(configPath), loadTrace(options.trace)]);
  } catch (error) {
    spinner?.fail('Failed to load input');
    throw error;
  }
  spinner?.succeed(`Loaded ${configs.length} cache level(s) and ${records.length} access(es)`);

  if (verbose) {
    describeLevels(configs);
  }
  if (records.length === 0 && !quiet) {
    status.warning(`${options.trace} contains no accesses`);
  }

  const streamLog = format === 'text' && !quiet;
  const simulator = new AccessSimulator(new CacheHierarchy(configs), {
    verifyInvariants: settings.simulation.verifyInvariants,
    onAccess: streamLog
      ? (entry: AccessLogEntry) => write(formatAccessLogEntry(entry, { addressFormat }))
      : undefined,
  });
  const { entries, statistics } = simulator.run(records);

  if (format === 'json') {
    write(
      formatJson({
        levels: configs,
        ...(quiet ? {} : { entries }),
        ...(stats ? { statistics } : {}),
      })
    );
    return;
  }

  if (stats) {
    if (streamLog && entries.length > 0) {
      write('\n');
    }
    write(formatSummary(statistics));
  }
}

/**
 * Run command implementation
 */
async function runAction(configPath: string, options: RunOptions): Promise<void> {
  const verbose = options.verbose ?? false;
  try {
    const settings = mergeSettings(await loadSettings(), flagSettings(options));
    await simulateRun(configPath, options, settings);
  } catch (error) {
    reportFailure(error, verbose);
  }
}

/**
 * Build the run command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Simulate a memory access trace against a cache hierarchy')
    .argument('<config>', 'Cache configuration file, one level per line')
    .requiredOption('-t, --trace <file>', 'Trace file, one access per line')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS))
    .addOption(new Option('--address-format <format>', 'Address format in the event log').choices(['hex', 'decimal']))
    .option('--stats', 'Print the end-of-run summary')
    .option('--no-stats', 'Skip the end-of-run summary')
    .option('--check-invariants', 'Verify hierarchy invariants after every access')
    .option('-q, --quiet', 'Print the summary only, without the event log')
    .option('--verbose', 'Enable verbose output')
    .action(runAction);
}
