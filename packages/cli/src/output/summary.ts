/**
 * Summary format — end-of-run statistics.
 */

import { formatTable, type TableRow } from './table.js';

import type { LevelReport, SimulationStatistics } from 'cachesim-core';

export function formatHitRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

function levelRow(report: LevelReport): TableRow {
  return {
    level: report.name,
    'read hits': report.readHits,
    'read misses': report.readMisses,
    'write hits': report.writeHits,
    'write misses': report.writeMisses,
    'hit rate': formatHitRate(report.hitRate),
    evictions: report.evictions,
    writebacks: report.writebacks,
    invalidations: report.invalidations,
  };
}

/**
 * Render access totals, one table row per level and backing store traffic
 */
export function formatSummary(statistics: SimulationStatistics): string {
  const { accesses, levels, backingStore } = statistics;
  return [
    `Accesses: ${accesses.total} (${accesses.reads} reads, ${accesses.writes} writes)\n`,
    '\n',
    formatTable(levels.map(levelRow)),
    '\n',
    `Memory: ${backingStore.reads} reads, ${backingStore.writes} writes\n`,
  ].join('');
}
