/**
 * Settings Loader - CLI settings loading and merging
 *
 * Loads settings from .cachesim/config.json and merges them over the
 * defaults, then applies CACHESIM_* environment variable overrides. A
 * missing settings file is not an error.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { DEFAULT_SETTINGS } from './defaults.js';
import {
  SettingsValidationException,
  assertValidSettings,
  isAddressFormat,
  isOutputFormat,
  type SettingsValidationError,
} from './settings-validator.js';

import type { CliSettings, PartialCliSettings } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory name for cachesim settings */
export const SETTINGS_DIR = '.cachesim';

/** Settings file name */
export const SETTINGS_FILE = 'config.json';

/** Environment variable prefix for settings overrides */
const ENV_PREFIX = 'CACHESIM_';

/** Environment variable names for specific settings */
export const ENV_VARS = {
  FORMAT: `${ENV_PREFIX}FORMAT`,
  ADDRESS_FORMAT: `${ENV_PREFIX}ADDRESS_FORMAT`,
  STATS: `${ENV_PREFIX}STATS`,
  VERIFY_INVARIANTS: `${ENV_PREFIX}VERIFY_INVARIANTS`,
} as const;

type Environment = Record<string, string | undefined>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a boolean from an environment variable string
 */
function parseEnvBoolean(value: string): boolean | undefined {
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Merge a settings fragment over complete settings. Keys the fragment
 * leaves undefined keep their current value.
 */
export function mergeSettings(base: CliSettings, fragment: PartialCliSettings): CliSettings {
  const output = { ...base.output };
  const simulation = { ...base.simulation };

  const { format, addressFormat, stats } = fragment.output ?? {};
  if (format !== undefined) {output.format = format;}
  if (addressFormat !== undefined) {output.addressFormat = addressFormat;}
  if (stats !== undefined) {output.stats = stats;}

  const verifyInvariants = fragment.simulation?.verifyInvariants;
  if (verifyInvariants !== undefined) {simulation.verifyInvariants = verifyInvariants;}

  return { output, simulation };
}

// ============================================================================
// Environment Overrides
// ============================================================================

/**
 * Read CACHESIM_* overrides from an environment.
 *
 * @throws SettingsValidationException listing every unusable value
 */
export function readEnvOverrides(env: Environment): PartialCliSettings {
  const errors: SettingsValidationError[] = [];
  const output: NonNullable<PartialCliSettings['output']> = {};
  const simulation: NonNullable<PartialCliSettings['simulation']> = {};

  const format = env[ENV_VARS.FORMAT];
  if (format !== undefined) {
    if (isOutputFormat(format)) {
      output.format = format;
    } else {
      errors.push({ path: ENV_VARS.FORMAT, message: 'Invalid output format', expected: 'text | json', actual: format });
    }
  }

  const addressFormat = env[ENV_VARS.ADDRESS_FORMAT];
  if (addressFormat !== undefined) {
    if (isAddressFormat(addressFormat)) {
      output.addressFormat = addressFormat;
    } else {
      errors.push({
        path: ENV_VARS.ADDRESS_FORMAT,
        message: 'Invalid address format',
        expected: 'hex | decimal',
        actual: addressFormat,
      });
    }
  }

  for (const [name, apply] of [
    [ENV_VARS.STATS, (value: boolean) => { output.stats = value; }],
    [ENV_VARS.VERIFY_INVARIANTS, (value: boolean) => { simulation.verifyInvariants = value; }],
  ] as const) {
    const raw = env[name];
    if (raw === undefined) {continue;}
    const value = parseEnvBoolean(raw);
    if (value === undefined) {
      errors.push({ path: name, message: 'Must be a boolean', expected: 'true | false | 1 | 0 | yes | no', actual: raw });
    } else {
      apply(value);
    }
  }

  if (errors.length > 0) {
    throw new SettingsValidationException('Invalid environment overrides', errors);
  }
  return { output, simulation };
}

// ============================================================================
// Settings Loader
// ============================================================================

/**
 * Settings loader options
 */
export interface SettingsLoaderOptions {
  /** Directory holding .cachesim/config.json */
  rootDir?: string | undefined;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Environment | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
}

/**
 * Path of the settings file under a root directory
 */
export function getSettingsPath(rootDir: string): string {
  return path.join(rootDir, SETTINGS_DIR, SETTINGS_FILE);
}

/**
 * Read and validate the settings file.
 *
 * @returns the validated fragment, or an empty fragment when there is no file
 * @throws SettingsValidationException for unparseable JSON or invalid values
 */
export async function readSettingsFile(filePath: string): Promise<PartialCliSettings> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SettingsValidationException(`Invalid settings in ${filePath}`, [
      { path: '', message: `Invalid JSON: ${message}` },
    ]);
  }

  return assertValidSettings(parsed, filePath);
}

/**
 * Load the effective settings: defaults, then the settings file, then the
 * environment.
 */
export async function loadSettings(options: SettingsLoaderOptions = {}): Promise<CliSettings> {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;

  const fromFile = await readSettingsFile(getSettingsPath(rootDir));
  let settings = mergeSettings(DEFAULT_SETTINGS, fromFile);

  if (options.applyEnvOverrides ?? true) {
    settings = mergeSettings(settings, readEnvOverrides(env));
  }
  return settings;
}
