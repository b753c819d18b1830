/**
 * Cache Level
 *
 * One write-back, write-allocate set-associative cache. A level serves reads
 * and writes against its own sets and counts what happened; it never talks to
 * other levels. Moving blocks between levels is the hierarchy's job.
 */

import {
  blockAddress,
  decodeAddress,
  geometryOf,
  type DecodedAddress,
} from '../geometry/address-decoder.js';
import { createEvictionPolicy, type EvictionPolicy } from '../policies/eviction-policy.js';

import type {
  BlockDeparture,
  CacheConfig,
  CacheGeometry,
  LevelStatistics,
  Operation,
  Outcome,
} from '../types.js';

// ============================================================================
// Types
// ============================================================================

interface Line {
  valid: boolean;
  dirty: boolean;
  tag: number;
}

interface CacheSet {
  lines: Line[];
  policy: EvictionPolicy;
}

export interface LookupResult {
  outcome: Outcome;
}

export interface FillResult {
  /** Present when the fill displaced a valid block */
  eviction?: BlockDeparture;
}

export interface LevelAccessResult extends LookupResult, FillResult {}

/**
 * A valid line, as seen from outside the level
 */
export interface ResidentBlock {
  setIndex: number;
  slot: number;
  tag: number;
  dirty: boolean;
  /** Block-aligned address */
  address: number;
}

function emptyStatistics(): LevelStatistics {
  return {
    readHits: 0,
    readMisses: 0,
    writeHits: 0,
    writeMisses: 0,
    evictions: 0,
    writebacks: 0,
    invalidations: 0,
  };
}

// ============================================================================
// Cache Level
// ============================================================================

export class CacheLevel {
  readonly config: CacheConfig;
  readonly geometry: CacheGeometry;
  private readonly sets: CacheSet[];
  private readonly counters: LevelStatistics = emptyStatistics();

  constructor(config: CacheConfig) {
    this.config = config;
    this.geometry = geometryOf(config);
    this.sets = Array.from({ length: this.geometry.numSets }, () => ({
      lines: Array.from({ length: this.geometry.associativity }, () => ({
        valid: false,
        dirty: false,
        tag: 0,
      })),
      policy: createEvictionPolicy(config.policy),
    }));
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Counters accumulated so far
   */
  get statistics(): Readonly<LevelStatistics> {
    return { ...this.counters };
  }

  /**
   * Serve an access completely at this level: look it up, and on a miss
   * allocate the block here (dirty for writes).
   */
  access(address: number, operation: Operation): LevelAccessResult {
    const lookup = this.lookup(address, operation);
    if (lookup.outcome === 'hit') {
      return lookup;
    }
    return { ...lookup, ...this.fill(address, operation === 'write') };
  }

  /**
   * Check for the block and count the outcome.
   *
   * A hit refreshes the policy ledger and, for writes, marks the line dirty.
   * A miss leaves the sets untouched.
   */
  lookup(address: number, operation: Operation): LookupResult {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    const slot = this.findSlot(set, decoded.tag);

    if (slot === -1) {
      if (operation === 'read') {
        this.counters.readMisses++;
      } else {
        this.counters.writeMisses++;
      }
      return { outcome: 'miss' };
    }

    set.policy.touch(slot);
    if (operation === 'write') {
      this.lineAt(set, slot).dirty = true;
      this.counters.writeHits++;
    } else {
      this.counters.readHits++;
    }
    return { outcome: 'hit' };
  }

  /**
   * Block address a fill of `address` would evict, or null if the target
   * set still has a free slot
   */
  victimFor(address: number): number | null {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    if (this.findFreeSlot(set) !== -1) {
      return null;
    }
    const victim = set.policy.chooseVictim();
    return blockAddress(this.lineAt(set, victim).tag, decoded.setIndex, this.geometry);
  }

  /**
   * Place a block that is not resident. Uses the lowest free slot, otherwise
   * evicts the policy's victim.
   */
  fill(address: number, dirty: boolean): FillResult {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    let slot = this.findFreeSlot(set);
    let eviction: BlockDeparture | undefined;

    if (slot === -1) {
      slot = set.policy.chooseVictim();
      const victim = this.lineAt(set, slot);
      eviction = {
        address: blockAddress(victim.tag, decoded.setIndex, this.geometry),
        writeback: victim.dirty,
      };
      if (victim.dirty) {
        this.counters.writebacks++;
      }
      this.counters.evictions++;
      set.policy.remove(slot);
    }

    const line = this.lineAt(set, slot);
    line.valid = true;
    line.dirty = dirty;
    line.tag = decoded.tag;
    set.policy.insert(slot);

    return eviction ? { eviction } : {};
  }

  /**
   * Drop a block because the level below evicted it.
   *
   * @returns the departed block, or null if it was not resident
   */
  invalidate(address: number): BlockDeparture | null {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    const slot = this.findSlot(set, decoded.tag);
    if (slot === -1) {
      return null;
    }

    const line = this.lineAt(set, slot);
    const writeback = line.dirty;
    if (writeback) {
      this.counters.writebacks++;
    }
    this.counters.invalidations++;
    line.valid = false;
    line.dirty = false;
    set.policy.remove(slot);

    return {
      address: blockAddress(decoded.tag, decoded.setIndex, this.geometry),
      writeback,
    };
  }

  /**
   * Accept dirty data written back from the level above.
   *
   * @returns false when the block is not resident here
   */
  receiveWriteback(address: number): boolean {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    const slot = this.findSlot(set, decoded.tag);
    if (slot === -1) {
      return false;
    }
    this.lineAt(set, slot).dirty = true;
    return true;
  }

  contains(address: number): boolean {
    const decoded = decodeAddress(address, this.geometry);
    return this.findSlot(this.setAt(decoded), decoded.tag) !== -1;
  }

  isDirty(address: number): boolean {
    const decoded = decodeAddress(address, this.geometry);
    const set = this.setAt(decoded);
    const slot = this.findSlot(set, decoded.tag);
    return slot !== -1 && this.lineAt(set, slot).dirty;
  }

  /**
   * Snapshot of every valid line, in set then slot order
   */
  residentBlocks(): ResidentBlock[] {
    const blocks: ResidentBlock[] = [];
    this.sets.forEach((set, setIndex) => {
      set.lines.forEach((line, slot) => {
        if (line.valid) {
          blocks.push({
            setIndex,
            slot,
            tag: line.tag,
            dirty: line.dirty,
            address: blockAddress(line.tag, setIndex, this.geometry),
          });
        }
      });
    });
    return blocks;
  }

  /**
   * Occupied slots of a set in eviction order (next victim candidate first
   * for FIFO and LRU, last for MRU)
   */
  policyOrder(setIndex: number): readonly number[] {
    const set = this.sets[setIndex];
    return set ? set.policy.order() : [];
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private setAt(decoded: DecodedAddress): CacheSet {
    const set = this.sets[decoded.setIndex];
    if (!set) {
      throw new RangeError(`${this.name}: set index ${decoded.setIndex} out of range`);
    }
    return set;
  }

  private lineAt(set: CacheSet, slot: number): Line {
    const line = set.lines[slot];
    if (!line) {
      throw new RangeError(`${this.name}: slot ${slot} out of range`);
    }
    return line;
  }

  private findSlot(set: CacheSet, tag: number): number {
    return set.lines.findIndex((line) => line.valid && line.tag === tag);
  }

  private findFreeSlot(set: CacheSet): number {
    return set.lines.findIndex((line) => !line.valid);
  }
}
