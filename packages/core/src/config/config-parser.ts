/**
 * Config Parser - Cache level configuration
 *
 * Parses the line-oriented level format
 *
 *   <size> <blockSize> <associativity> <policy> <writePolicy> <name>
 *
 * e.g. `64 8 2 LRU WB L1`, one level per line, top level first. Blank lines
 * and lines starting with `#` are skipped.
 */

import {
  EVICTION_POLICY_KINDS,
  WRITE_POLICIES,
  type CacheConfig,
  type EvictionPolicyKind,
  type WritePolicy,
} from '../types.js';
import { BACKING_STORE_LABEL } from '../cache/backing-store.js';

// ============================================================================
// Constants
// ============================================================================

/** Number of whitespace-separated fields in a level line */
const FIELD_COUNT = 6;

/** Most levels a configuration may declare */
export const MAX_LEVELS = 2;

const INTEGER_PATTERN = /^\d+$/;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when a configuration is malformed or describes an impossible
 * geometry
 */
export class ConfigError extends Error {
  public readonly lineNumber: number | undefined;
  public readonly field: string | undefined;

  constructor(message: string, lineNumber?: number | undefined, field?: string | undefined) {
    super(lineNumber === undefined ? message : `line ${lineNumber}: ${message}`);
    this.name = 'ConfigError';
    this.lineNumber = lineNumber;
    this.field = field;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function isPowerOfTwo(value: number): boolean {
  if (value <= 0) {
    return false;
  }
  // Math.log2 rounds near 2^53, so confirm the exponent
  const bits = Math.log2(value);
  return Number.isInteger(bits) && 2 ** bits === value;
}

function parsePositiveInteger(token: string, field: string, lineNumber: number): number {
  if (!INTEGER_PATTERN.test(token)) {
    throw new ConfigError(`${field} must be a positive integer, got '${token}'`, lineNumber, field);
  }
  const value = Number(token);
  if (value === 0 || !Number.isSafeInteger(value)) {
    throw new ConfigError(`${field} must be a positive integer, got '${token}'`, lineNumber, field);
  }
  return value;
}

function parsePolicy(token: string, lineNumber: number): EvictionPolicyKind {
  const policy = EVICTION_POLICY_KINDS.find((kind) => kind === token.toUpperCase());
  if (!policy) {
    throw new ConfigError(
      `unsupported eviction policy '${token}' (expected ${EVICTION_POLICY_KINDS.join(', ')})`,
      lineNumber,
      'policy'
    );
  }
  return policy;
}

function parseWritePolicy(token: string, lineNumber: number): WritePolicy {
  const writePolicy = WRITE_POLICIES.find((kind) => kind === token.toUpperCase());
  if (!writePolicy) {
    throw new ConfigError(
      `unsupported write policy '${token}' (expected ${WRITE_POLICIES.join(', ')})`,
      lineNumber,
      'writePolicy'
    );
  }
  return writePolicy;
}

function isSkippable(line: string): boolean {
  return line.length === 0 || line.startsWith('#');
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check the geometry rules of a single level.
 *
 * @throws ConfigError when the level cannot be built
 */
export function validateCacheConfig(config: CacheConfig, lineNumber?: number): CacheConfig {
  const { name, size, blockSize, associativity } = config;

  if (name === BACKING_STORE_LABEL) {
    throw new ConfigError(`level name '${name}' is reserved for the backing store`, lineNumber, 'name');
  }

  for (const [field, value] of [
    ['size', size],
    ['blockSize', blockSize],
    ['associativity', associativity],
  ] as const) {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new ConfigError(`${name}: ${field} must be a positive integer, got ${value}`, lineNumber, field);
    }
  }

  if (!isPowerOfTwo(blockSize)) {
    throw new ConfigError(`${name}: block size ${blockSize} is not a power of two`, lineNumber, 'blockSize');
  }
  if (size % blockSize !== 0) {
    throw new ConfigError(
      `${name}: size ${size} is not a multiple of block size ${blockSize}`,
      lineNumber,
      'size'
    );
  }
  const blocks = size / blockSize;
  if (blocks % associativity !== 0) {
    throw new ConfigError(
      `${name}: ${blocks} blocks cannot be split into sets of ${associativity} ways`,
      lineNumber,
      'associativity'
    );
  }
  if (!EVICTION_POLICY_KINDS.includes(config.policy)) {
    throw new ConfigError(`${name}: unsupported eviction policy '${config.policy}'`, lineNumber, 'policy');
  }
  if (!WRITE_POLICIES.includes(config.writePolicy)) {
    throw new ConfigError(`${name}: unsupported write policy '${config.writePolicy}'`, lineNumber, 'writePolicy');
  }
  return config;
}

/**
 * Check rules that span levels: count, unique names, shared block size.
 */
export function validateHierarchy(configs: readonly CacheConfig[]): void {
  if (configs.length === 0) {
    throw new ConfigError('configuration declares no cache level');
  }
  if (configs.length > MAX_LEVELS) {
    throw new ConfigError(`configuration declares ${configs.length} levels, at most ${MAX_LEVELS} are supported`);
  }

  const seen = new Set<string>();
  for (const config of configs) {
    if (seen.has(config.name)) {
      throw new ConfigError(`duplicate level name '${config.name}'`, undefined, 'name');
    }
    seen.add(config.name);
  }

  const [top] = configs;
  for (const config of configs) {
    if (top && config.blockSize !== top.blockSize) {
      throw new ConfigError(
        `${config.name}: block size ${config.blockSize} differs from ${top.name} block size ${top.blockSize}`,
        undefined,
        'blockSize'
      );
    }
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse one level line
 */
export function parseCacheConfigLine(line: string, lineNumber: number): CacheConfig {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length !== FIELD_COUNT) {
    throw new ConfigError(
      `expected ${FIELD_COUNT} fields '<size> <blockSize> <associativity> <policy> <writePolicy> <name>', got ${tokens.length}`,
      lineNumber
    );
  }
  const [sizeToken = '', blockToken = '', assocToken = '', policyToken = '', writeToken = '', name = ''] =
    tokens;

  const config: CacheConfig = {
    name,
    size: parsePositiveInteger(sizeToken, 'size', lineNumber),
    blockSize: parsePositiveInteger(blockToken, 'blockSize', lineNumber),
    associativity: parsePositiveInteger(assocToken, 'associativity', lineNumber),
    policy: parsePolicy(policyToken, lineNumber),
    writePolicy: parseWritePolicy(writeToken, lineNumber),
  };
  return validateCacheConfig(config, lineNumber);
}

/**
 * Parse a whole configuration, top level first
 */
export function parseCacheConfig(text: string): CacheConfig[] {
  const configs: CacheConfig[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!isSkippable(line)) {
      configs.push(parseCacheConfigLine(line, index + 1));
    }
  });
  validateHierarchy(configs);
  return configs;
}

/**
 * Geometry summary of a level, for display
 */
export interface GeometryDescription {
  name: string;
  policy: EvictionPolicyKind;
  size: number;
  blockSize: number;
  blocks: number;
  sets: number;
  ways: number;
  offsetBits: number;
  /** Index bits, or null when the set count is not a power of two */
  indexBits: number | null;
}

export function describeGeometry(config: CacheConfig): GeometryDescription {
  const blocks = config.size / config.blockSize;
  const sets = blocks / config.associativity;
  return {
    name: config.name,
    policy: config.policy,
    size: config.size,
    blockSize: config.blockSize,
    blocks,
    sets,
    ways: config.associativity,
    offsetBits: Math.log2(config.blockSize),
    indexBits: isPowerOfTwo(sets) ? Math.log2(sets) : null,
  };
}
