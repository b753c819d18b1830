/**
 * Core type definitions
 *
 * Shared types for cache configuration, trace records, per-access events
 * and simulation statistics.
 */

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Replacement policy used to pick a victim in a full set
 *
 * - FIFO: evict the line that arrived first
 * - LRU: evict the least recently used line
 * - MRU: evict the most recently used line
 */
export type EvictionPolicyKind = 'FIFO' | 'LRU' | 'MRU';

/** Supported eviction policies, in the order they are documented */
export const EVICTION_POLICY_KINDS: readonly EvictionPolicyKind[] = ['FIFO', 'LRU', 'MRU'];

/**
 * Write policy of a level. Only write-back (with write-allocate) exists.
 */
export type WritePolicy = 'WB';

/** Supported write policies */
export const WRITE_POLICIES: readonly WritePolicy[] = ['WB'];

/**
 * Parameters of one cache level, already validated
 */
export interface CacheConfig {
  /** Level label used in the event log (e.g. 'L1') */
  name: string;
  /** Total capacity in bytes */
  size: number;
  /** Block (line) size in bytes, a power of two */
  blockSize: number;
  /** Lines per set */
  associativity: number;
  /** Replacement policy */
  policy: EvictionPolicyKind;
  /** Write policy */
  writePolicy: WritePolicy;
}

/**
 * Geometry derived from a CacheConfig
 */
export interface CacheGeometry {
  blockSize: number;
  numSets: number;
  associativity: number;
}

// ============================================================================
// Trace Types
// ============================================================================

export type Operation = 'read' | 'write';

/**
 * One memory access from the trace
 */
export interface AccessRecord {
  readonly operation: Operation;
  /** Non-negative byte address */
  readonly address: number;
}

// ============================================================================
// Event Types
// ============================================================================

export type Outcome = 'hit' | 'miss';

/**
 * A block leaving a level, either by eviction or back-invalidation
 */
export interface BlockDeparture {
  /** Block-aligned address of the departing block */
  readonly address: number;
  /** Whether the block was dirty and had to be written back */
  readonly writeback: boolean;
}

/**
 * What happened at one level for one access
 */
export interface EventRecord {
  /** Level name, or the backing store label */
  readonly level: string;
  readonly operation: Operation;
  readonly outcome: Outcome;
  /** Address of the access that reached this level */
  readonly address: number;
  /** Present when the fill at this level evicted a block */
  readonly eviction?: BlockDeparture;
  /** Present when the evicted block was also dropped from the levels above */
  readonly backInvalidation?: BlockDeparture;
}

// ============================================================================
// Statistics Types
// ============================================================================

/**
 * Counters owned by one cache level
 */
export interface LevelStatistics {
  readHits: number;
  readMisses: number;
  writeHits: number;
  writeMisses: number;
  evictions: number;
  writebacks: number;
  /** Blocks dropped because the level below evicted them */
  invalidations: number;
}

/**
 * Counters of the backing store
 */
export interface BackingStoreStatistics {
  /** Blocks fetched by the last cache level */
  reads: number;
  /** Dirty blocks written back by the last cache level */
  writes: number;
}

/**
 * Level counters with derived totals, as reported at the end of a run
 */
export interface LevelReport extends LevelStatistics {
  name: string;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 when the level saw no access */
  hitRate: number;
}

export interface SimulationStatistics {
  accesses: {
    reads: number;
    writes: number;
    total: number;
  };
  levels: LevelReport[];
  backingStore: BackingStoreStatistics;
}
