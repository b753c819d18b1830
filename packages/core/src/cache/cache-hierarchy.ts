/**
 * Cache Hierarchy
 *
 * Stacks cache levels over a backing store and keeps them inclusive: a block
 * valid in a level is valid in every level below it.
 *
 * A miss is served bottom-up. The block is fetched from below, the level
 * makes room (back-invalidating its victim from the levels above), and only
 * then is the block installed. Events are returned top-down, one per level
 * consulted, ending with the backing store when it was reached.
 */

import { InvariantViolation } from '../errors.js';
import { createLevelReport } from '../statistics.js';
import { BACKING_STORE_LABEL, BackingStore } from './backing-store.js';
import { CacheLevel } from './cache-level.js';

import type {
  AccessRecord,
  BackingStoreStatistics,
  BlockDeparture,
  CacheConfig,
  EventRecord,
  LevelReport,
  Operation,
  Outcome,
} from '../types.js';

interface EventFields {
  level: string;
  operation: Operation;
  outcome: Outcome;
  address: number;
  eviction?: BlockDeparture | undefined;
  backInvalidation?: BlockDeparture | undefined;
}

function createEvent(fields: EventFields): EventRecord {
  const event: EventRecord = {
    level: fields.level,
    operation: fields.operation,
    outcome: fields.outcome,
    address: fields.address,
    ...(fields.eviction ? { eviction: Object.freeze({ ...fields.eviction }) } : {}),
    ...(fields.backInvalidation
      ? { backInvalidation: Object.freeze({ ...fields.backInvalidation }) }
      : {}),
  };
  return Object.freeze(event);
}

export class CacheHierarchy {
  readonly levels: readonly CacheLevel[];
  readonly backingStore = new BackingStore();

  constructor(configs: readonly CacheConfig[]) {
    if (configs.length === 0) {
      throw new RangeError('A cache hierarchy needs at least one level');
    }
    this.levels = configs.map((config) => new CacheLevel(config));
  }

  /**
   * Run one access through the hierarchy
   */
  access(record: AccessRecord): EventRecord[] {
    const { address, operation } = record;
    const top = this.levelAt(0);

    if (top.lookup(address, operation).outcome === 'hit') {
      return [createEvent({ level: top.name, operation, outcome: 'hit', address })];
    }

    const below = this.fetch(1, address);
    const { eviction } = top.fill(address, operation === 'write');
    this.writeBack(0, eviction);

    return [
      createEvent({ level: top.name, operation, outcome: 'miss', address, eviction }),
      ...below,
    ];
  }

  /**
   * Per-level reports and backing store counters
   */
  statistics(): { levels: LevelReport[]; backingStore: BackingStoreStatistics } {
    return {
      levels: this.levels.map((level) => createLevelReport(level.name, level.statistics)),
      backingStore: this.backingStore.statistics,
    };
  }

  /**
   * Check structural invariants of every level and inclusion between them.
   *
   * @throws InvariantViolation on the first breach found
   */
  verifyInvariants(): void {
    this.levels.forEach((level, depth) => {
      const blocks = level.residentBlocks();

      for (let setIndex = 0; setIndex < level.geometry.numSets; setIndex++) {
        const resident = blocks.filter((block) => block.setIndex === setIndex).length;
        if (resident > level.geometry.associativity) {
          throw new InvariantViolation(
            `${level.name}: set ${setIndex} holds ${resident} blocks, more than ${level.geometry.associativity} ways`,
            level.name
          );
        }
        const tracked = level.policyOrder(setIndex).length;
        if (tracked !== resident) {
          throw new InvariantViolation(
            `${level.name}: set ${setIndex} tracks ${tracked} slots for ${resident} resident blocks`,
            level.name
          );
        }
      }

      for (const [counter, value] of Object.entries(level.statistics)) {
        if (value < 0) {
          throw new InvariantViolation(`${level.name}: counter ${counter} is negative`, level.name);
        }
      }

      const lower = this.levels[depth + 1];
      if (lower) {
        for (const block of blocks) {
          if (!lower.contains(block.address)) {
            throw new InvariantViolation(
              `${level.name}: block 0x${block.address.toString(16)} is not resident in ${lower.name}`,
              level.name
            );
          }
        }
      }
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Bring the block at `address` into the level at `depth` (or read it from
   * the backing store) and return the events from that depth down
   */
  private fetch(depth: number, address: number): EventRecord[] {
    const level = this.levels[depth];
    if (!level) {
      this.backingStore.read();
      return [createEvent({ level: BACKING_STORE_LABEL, operation: 'read', outcome: 'hit', address })];
    }

    if (level.lookup(address, 'read').outcome === 'hit') {
      return [createEvent({ level: level.name, operation: 'read', outcome: 'hit', address })];
    }

    const below = this.fetch(depth + 1, address);

    const victim = level.victimFor(address);
    const backInvalidation = victim === null ? undefined : this.backInvalidate(depth, victim);

    const { eviction } = level.fill(address, false);
    this.writeBack(depth, eviction);

    return [
      createEvent({ level: level.name, operation: 'read', outcome: 'miss', address, eviction, backInvalidation }),
      ...below,
    ];
  }

  /**
   * Drop `victim` from every level above `depth`, merging dirty copies into
   * the level at `depth` before it evicts the block
   */
  private backInvalidate(depth: number, victim: number): BlockDeparture | undefined {
    let present = false;
    let dirty = false;

    for (const upper of this.levels.slice(0, depth)) {
      const departure = upper.invalidate(victim);
      if (departure) {
        present = true;
        dirty = dirty || departure.writeback;
      }
    }

    if (!present) {
      return undefined;
    }
    if (dirty) {
      this.writeInto(depth, victim);
    }
    return { address: victim, writeback: dirty };
  }

  /**
   * Send a dirty evicted block from the level at `depth` to the next one down
   */
  private writeBack(depth: number, eviction: BlockDeparture | undefined): void {
    if (eviction?.writeback) {
      this.writeInto(depth + 1, eviction.address);
    }
  }

  private writeInto(depth: number, address: number): void {
    const level = this.levels[depth];
    if (!level) {
      this.backingStore.write();
      return;
    }
    if (!level.receiveWriteback(address)) {
      throw new InvariantViolation(
        `${level.name}: written-back block 0x${address.toString(16)} is not resident`,
        level.name
      );
    }
  }

  private levelAt(depth: number): CacheLevel {
    const level = this.levels[depth];
    if (!level) {
      throw new RangeError(`No cache level at depth ${depth}`);
    }
    return level;
  }
}
