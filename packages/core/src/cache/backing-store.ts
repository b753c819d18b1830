/**
 * Backing Store
 *
 * Unbounded memory below the last cache level. Every block is present, so
 * reads always hit; only traffic is counted.
 */

import type { BackingStoreStatistics } from '../types.js';

/** Label used for backing store events */
export const BACKING_STORE_LABEL = 'Memory';

export class BackingStore {
  readonly name = BACKING_STORE_LABEL;
  private readonly counters: BackingStoreStatistics = { reads: 0, writes: 0 };

  /**
   * Supply a block to the last cache level
   */
  read(): void {
    this.counters.reads++;
  }

  /**
   * Accept a dirty block evicted from the last cache level
   */
  write(): void {
    this.counters.writes++;
  }

  get statistics(): Readonly<BackingStoreStatistics> {
    return { ...this.counters };
  }
}
