/**
 * Settings Validator - Validate CLI settings from files, environment and flags
 *
 * Every problem is collected with its path so a user can fix a settings
 * file in one pass.
 */

import { OUTPUT_FORMATS, type AddressFormat, type OutputFormat } from '../output/index.js';

import type { OutputSettings, PartialCliSettings, SimulationSettings } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Valid address format values */
const VALID_ADDRESS_FORMATS: readonly AddressFormat[] = ['hex', 'decimal'];

/** Known top-level sections */
const SECTIONS = ['output', 'simulation'] as const;

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Represents a single settings validation error
 */
export interface SettingsValidationError {
  /** Path to the invalid field (e.g., 'output.format') */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Expected value or type */
  expected?: string;
  /** Actual value received */
  actual?: unknown;
}

/**
 * Result of a settings validation operation
 */
export interface SettingsValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** Validated fragment (only present if valid) */
  data?: PartialCliSettings;
  /** List of validation errors (only present if invalid) */
  errors?: SettingsValidationError[];
}

/**
 * Error class for settings validation failures
 */
export class SettingsValidationException extends Error {
  constructor(
    message: string,
    public readonly errors: SettingsValidationError[]
  ) {
    super(message);
    this.name = 'SettingsValidationException';
  }

  /**
   * Format errors as a human-readable string
   */
  formatErrors(): string {
    if (this.errors.length === 0) {return 'No errors';}

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path}: ${e.message}`;
        if (e.expected) {msg += `\n    Expected: ${e.expected}`;}
        if (e.actual !== undefined) {msg += `\n    Got: ${JSON.stringify(e.actual)}`;}
        return msg;
      })
      .join('\n');
  }
}

// ============================================================================
// Helper Validation Functions
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function isAddressFormat(value: unknown): value is AddressFormat {
  return VALID_ADDRESS_FORMATS.some((format) => format === value);
}

function validateOutput(
  raw: Record<string, unknown>,
  errors: SettingsValidationError[]
): Partial<OutputSettings> {
  const output: Partial<OutputSettings> = {};

  for (const key of Object.keys(raw)) {
    const value = raw[key];
    const path = `output.${key}`;
    switch (key) {
      case 'format':
        if (isOutputFormat(value)) {
          output.format = value;
        } else {
          errors.push({ path, message: 'Invalid output format', expected: OUTPUT_FORMATS.join(' | '), actual: value });
        }
        break;
      case 'addressFormat':
        if (isAddressFormat(value)) {
          output.addressFormat = value;
        } else {
          errors.push({
            path,
            message: 'Invalid address format',
            expected: VALID_ADDRESS_FORMATS.join(' | '),
            actual: value,
          });
        }
        break;
      case 'stats':
        if (typeof value === 'boolean') {
          output.stats = value;
        } else {
          errors.push({ path, message: 'Must be a boolean', expected: 'boolean', actual: value });
        }
        break;
      default:
        errors.push({ path, message: 'Unknown setting' });
    }
  }

  return output;
}

function validateSimulation(
  raw: Record<string, unknown>,
  errors: SettingsValidationError[]
): Partial<SimulationSettings> {
  const simulation: Partial<SimulationSettings> = {};

  for (const key of Object.keys(raw)) {
    const value = raw[key];
    const path = `simulation.${key}`;
    if (key !== 'verifyInvariants') {
      errors.push({ path, message: 'Unknown setting' });
    } else if (typeof value === 'boolean') {
      simulation.verifyInvariants = value;
    } else {
      errors.push({ path, message: 'Must be a boolean', expected: 'boolean', actual: value });
    }
  }

  return simulation;
}

// ============================================================================
// Main Validation
// ============================================================================

/**
 * Validate a parsed settings document
 */
export function validateSettings(raw: unknown): SettingsValidationResult {
  const errors: SettingsValidationError[] = [];

  if (!isObject(raw)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Settings must be a JSON object', expected: 'object', actual: raw }],
    };
  }

  const data: PartialCliSettings = {};

  for (const key of Object.keys(raw)) {
    if (!SECTIONS.some((section) => section === key)) {
      errors.push({ path: key, message: 'Unknown settings section', expected: SECTIONS.join(' | ') });
    }
  }

  const output = raw['output'];
  if (output !== undefined) {
    if (isObject(output)) {
      data.output = validateOutput(output, errors);
    } else {
      errors.push({ path: 'output', message: 'Must be an object', expected: 'object', actual: output });
    }
  }

  const simulation = raw['simulation'];
  if (simulation !== undefined) {
    if (isObject(simulation)) {
      data.simulation = validateSimulation(simulation, errors);
    } else {
      errors.push({ path: 'simulation', message: 'Must be an object', expected: 'object', actual: simulation });
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true, data };
}

/**
 * Validate and return the fragment, or throw with every error listed
 */
export function assertValidSettings(raw: unknown, source: string): PartialCliSettings {
  const result = validateSettings(raw);
  if (!result.valid || !result.data) {
    throw new SettingsValidationException(`Invalid settings in ${source}`, result.errors ?? []);
  }
  return result.data;
}
