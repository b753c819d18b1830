/**
 * Access Simulator
 *
 * Folds a trace over a cache hierarchy, one access at a time and in input
 * order, and keeps the resulting log.
 */

import { CacheHierarchy } from '../cache/cache-hierarchy.js';

import type {
  AccessRecord,
  CacheConfig,
  EventRecord,
  SimulationStatistics,
} from '../types.js';

/**
 * Log entry for one access
 */
export interface AccessLogEntry {
  /** Zero-based position in the trace */
  index: number;
  record: AccessRecord;
  /** Events in top-down level order */
  events: readonly EventRecord[];
}

export interface SimulationResult {
  entries: AccessLogEntry[];
  statistics: SimulationStatistics;
}

export interface SimulatorOptions {
  /** Check hierarchy invariants after every access */
  verifyInvariants?: boolean | undefined;
  /** Called with each log entry as soon as it is produced */
  onAccess?: ((entry: AccessLogEntry) => void) | undefined;
}

export class AccessSimulator {
  readonly hierarchy: CacheHierarchy;
  private readonly options: SimulatorOptions;
  private reads = 0;
  private writes = 0;

  constructor(hierarchy: CacheHierarchy, options: SimulatorOptions = {}) {
    this.hierarchy = hierarchy;
    this.options = options;
  }

  /**
   * Number of accesses processed so far
   */
  get processed(): number {
    return this.reads + this.writes;
  }

  /**
   * Process one access
   */
  step(record: AccessRecord): AccessLogEntry {
    const index = this.processed;
    const events = this.hierarchy.access(record);

    if (record.operation === 'read') {
      this.reads++;
    } else {
      this.writes++;
    }

    if (this.options.verifyInvariants) {
      this.hierarchy.verifyInvariants();
    }

    const entry: AccessLogEntry = { index, record, events };
    this.options.onAccess?.(entry);
    return entry;
  }

  /**
   * Process every record in order
   */
  run(records: Iterable<AccessRecord>): SimulationResult {
    const entries: AccessLogEntry[] = [];
    for (const record of records) {
      entries.push(this.step(record));
    }
    return { entries, statistics: this.statistics() };
  }

  statistics(): SimulationStatistics {
    return {
      accesses: {
        reads: this.reads,
        writes: this.writes,
        total: this.processed,
      },
      ...this.hierarchy.statistics(),
    };
  }
}

/**
 * Build a hierarchy for `configs` and run `records` through it
 */
export function simulate(
  configs: readonly CacheConfig[],
  records: Iterable<AccessRecord>,
  options: SimulatorOptions = {}
): SimulationResult {
  return new AccessSimulator(new CacheHierarchy(configs), options).run(records);
}
