/**
 * Statistics helpers
 */

import type { LevelReport, LevelStatistics } from './types.js';

/**
 * Add derived totals and the hit rate to a level's counters
 */
export function createLevelReport(name: string, counters: LevelStatistics): LevelReport {
  const hits = counters.readHits + counters.writeHits;
  const misses = counters.readMisses + counters.writeMisses;
  const total = hits + misses;
  return {
    name,
    ...counters,
    hits,
    misses,
    hitRate: total === 0 ? 0 : hits / total,
  };
}
