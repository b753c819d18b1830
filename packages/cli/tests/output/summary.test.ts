/**
 * Summary and Table Format Tests
 */

import { describe, it, expect } from 'vitest';
import { formatHitRate, formatSummary } from '../../src/output/summary.js';
import { formatTable } from '../../src/output/table.js';
import { formatJson } from '../../src/output/json.js';
import type { LevelReport, SimulationStatistics } from 'cachesim-core';

function report(name: string, overrides: Partial<LevelReport>): LevelReport {
  return {
    name,
    readHits: 0,
    readMisses: 0,
    writeHits: 0,
    writeMisses: 0,
    evictions: 0,
    writebacks: 0,
    invalidations: 0,
    hits: 0,
    misses: 0,
    hitRate: 0,
    ...overrides,
  };
}

describe('formatHitRate', () => {
  it('prints a percentage with two decimals', () => {
    expect(formatHitRate(0.5)).toBe('50.00%');
    expect(formatHitRate(1 / 3)).toBe('33.33%');
    expect(formatHitRate(0)).toBe('0.00%');
  });
});

describe('formatTable', () => {
  it('aligns columns to the widest cell', () => {
    const table = formatTable([
      { name: 'a', value: 1 },
      { name: 'long', value: 12345 },
    ]);
    expect(table).toBe(`name  value\n${'─'.repeat(11)}\na     1\nlong  12345\n`);
  });

  it('reports an empty result set', () => {
    expect(formatTable([])).toBe('No results.\n');
  });
});

describe('formatSummary', () => {
  it('prints access totals, one row per level and memory traffic', () => {
    const statistics: SimulationStatistics = {
      accesses: { reads: 2, writes: 0, total: 2 },
      levels: [
        report('L1', { readHits: 1, readMisses: 1, hits: 1, misses: 1, hitRate: 0.5 }),
        report('L2', { readMisses: 1, misses: 1 }),
      ],
      backingStore: { reads: 1, writes: 0 },
    };

    expect(formatSummary(statistics)).toBe(
      [
        'Accesses: 2 (2 reads, 0 writes)',
        '',
        'level  read hits  read misses  write hits  write misses  hit rate  evictions  writebacks  invalidations',
        '─'.repeat(103),
        'L1     1          1            0           0             50.00%    0          0           0',
        'L2     0          1            0           0             0.00%     0          0           0',
        '',
        'Memory: 1 reads, 0 writes',
        '',
      ].join('\n')
    );
  });
});

describe('formatJson', () => {
  it('pretty-prints with a trailing newline', () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}\n');
  });
});
