/**
 * cachesim-core
 *
 * Set-associative cache hierarchy simulation: geometry, eviction policies,
 * inclusive multi-level coordination and write-back propagation, plus the
 * configuration and trace readers that feed it.
 */

export * from './types.js';
export * from './errors.js';
export * from './statistics.js';

export * from './geometry/address-decoder.js';
export * from './policies/eviction-policy.js';

export * from './cache/backing-store.js';
export * from './cache/cache-level.js';
export * from './cache/cache-hierarchy.js';

export * from './simulator/access-simulator.js';

export * from './config/config-parser.js';
export * from './config/config-loader.js';

export * from './trace/trace-parser.js';
export * from './trace/trace-loader.js';
