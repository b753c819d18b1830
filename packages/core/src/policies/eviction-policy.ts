/**
 * Eviction Policies
 *
 * Each set of a cache level owns one policy instance. The policy keeps a
 * ledger of occupied slots ordered by arrival (FIFO) or by recency (LRU, MRU)
 * and names the slot to evict when the set is full. Slot order in the set
 * itself never changes.
 */

import { InvariantViolation } from '../errors.js';
import type { EvictionPolicyKind } from '../types.js';

/**
 * Per-set replacement bookkeeping
 */
export interface EvictionPolicy {
  readonly kind: EvictionPolicyKind;
  /** Record a block placed into `slot` */
  insert(slot: number): void;
  /** Record a hit on `slot` */
  touch(slot: number): void;
  /** Forget `slot` after its block was invalidated */
  remove(slot: number): void;
  /** Slot to evict from a full set. Does not change the ledger. */
  chooseVictim(): number;
  /** Occupied slots, oldest (or least recent) first */
  order(): readonly number[];
}

/**
 * Ledger shared by all policies: occupied slots, front is oldest
 */
abstract class OrderedEvictionPolicy implements EvictionPolicy {
  abstract readonly kind: EvictionPolicyKind;
  protected ledger: number[] = [];

  insert(slot: number): void {
    this.remove(slot);
    this.ledger.push(slot);
  }

  abstract touch(slot: number): void;

  remove(slot: number): void {
    const position = this.ledger.indexOf(slot);
    if (position !== -1) {
      this.ledger.splice(position, 1);
    }
  }

  chooseVictim(): number {
    const victim = this.pick();
    if (victim === undefined) {
      throw new InvariantViolation(`${this.kind} policy asked for a victim in an empty set`);
    }
    return victim;
  }

  order(): readonly number[] {
    return [...this.ledger];
  }

  protected abstract pick(): number | undefined;

  protected moveToBack(slot: number): void {
    this.remove(slot);
    this.ledger.push(slot);
  }
}

/**
 * First-in first-out: hits do not reorder
 */
export class FifoPolicy extends OrderedEvictionPolicy {
  readonly kind = 'FIFO' as const;

  touch(_slot: number): void {
    // arrival order only
  }

  protected pick(): number | undefined {
    return this.ledger[0];
  }
}

/**
 * Least recently used
 */
export class LruPolicy extends OrderedEvictionPolicy {
  readonly kind = 'LRU' as const;

  touch(slot: number): void {
    this.moveToBack(slot);
  }

  protected pick(): number | undefined {
    return this.ledger[0];
  }
}

/**
 * Most recently used
 */
export class MruPolicy extends OrderedEvictionPolicy {
  readonly kind = 'MRU' as const;

  touch(slot: number): void {
    this.moveToBack(slot);
  }

  protected pick(): number | undefined {
    return this.ledger[this.ledger.length - 1];
  }
}

const POLICY_FACTORIES: Record<EvictionPolicyKind, () => EvictionPolicy> = {
  FIFO: () => new FifoPolicy(),
  LRU: () => new LruPolicy(),
  MRU: () => new MruPolicy(),
};

/**
 * Create the policy instance for one set
 */
export function createEvictionPolicy(kind: EvictionPolicyKind): EvictionPolicy {
  return POLICY_FACTORIES[kind]();
}
