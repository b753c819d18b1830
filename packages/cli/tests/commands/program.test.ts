/**
 * Program Tests
 *
 * Drive the commands through createProgram() against files in a temporary
 * directory and capture what they print.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createProgram } from '../../src/index.js';

const TWO_LEVEL = '64 8 2 LRU WB L1\n128 8 4 FIFO WB L2\n';

const COLD_THEN_WARM_LOG =
  'L1: read miss at address 0x10\n' +
  'L2: read miss at address 0x10\n' +
  'Memory: read hit at address 0x10\n' +
  'L1: read hit at address 0x10\n';

const COLD_THEN_WARM_SUMMARY = [
  'Accesses: 2 (2 reads, 0 writes)',
  '',
  'level  read hits  read misses  write hits  write misses  hit rate  evictions  writebacks  invalidations',
  '─'.repeat(103),
  'L1     1          1            0           0             50.00%    0          0           0',
  'L2     0          1            0           0             0.00%     0          0           0',
  '',
  'Memory: 1 reads, 0 writes',
  '',
].join('\n');

describe('cachesim program', () => {
  let dir: string;
  let stdout: MockInstance;
  let stderr: MockInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cachesim-cli-'));
    vi.spyOn(process, 'cwd').mockReturnValue(dir);
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function file(name: string, content: string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  }

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(args, { from: 'user' });
  }

  function printed(): string {
    return stdout.mock.calls.map(([chunk]) => String(chunk)).join('');
  }

  function reported(): string {
    return stderr.mock.calls.map((call) => call.map(String).join(' ')).join('\n');
  }

  describe('run', () => {
    it('streams the event log and prints the summary', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0x10\nR 0x10\n');

      await run('run', config, '-t', trace);

      expect(printed()).toBe(`${COLD_THEN_WARM_LOG}\n${COLD_THEN_WARM_SUMMARY}`);
      expect(process.exitCode).toBeUndefined();
    });

    it('prints only the summary with --quiet', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0x10\nR 0x10\n');

      await run('run', config, '-t', trace, '--quiet');

      expect(printed()).toBe(COLD_THEN_WARM_SUMMARY);
    });

    it('prints only the log with --no-stats', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0x10\nR 0x10\n');

      await run('run', config, '-t', trace, '--no-stats');

      expect(printed()).toBe(COLD_THEN_WARM_LOG);
    });

    it('prints decimal addresses on request', async () => {
      const config = await file('cache.cfg', '64 8 2 LRU WB L1\n');
      const trace = await file('trace.txt', 'W 16\n');

      await run('run', config, '-t', trace, '--address-format', 'decimal', '--no-stats');

      expect(printed()).toBe('L1: write miss at address 16\nMemory: read hit at address 16\n');
    });

    it('prints one JSON document with -f json', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0x10\nW 0x10\n');

      await run('run', config, '-t', trace, '-f', 'json');

      const document: unknown = JSON.parse(printed());
      expect(document).toMatchObject({
        levels: [{ name: 'L1' }, { name: 'L2' }],
        entries: [
          {
            index: 0,
            record: { operation: 'read', address: 16 },
            events: [
              { level: 'L1', operation: 'read', outcome: 'miss', address: 16 },
              { level: 'L2', operation: 'read', outcome: 'miss', address: 16 },
              { level: 'Memory', operation: 'read', outcome: 'hit', address: 16 },
            ],
          },
          {
            index: 1,
            record: { operation: 'write', address: 16 },
            events: [{ level: 'L1', operation: 'write', outcome: 'hit', address: 16 }],
          },
        ],
        statistics: {
          accesses: { reads: 1, writes: 1, total: 2 },
          backingStore: { reads: 1, writes: 0 },
        },
      });
    });

    it('takes defaults from .cachesim/config.json and lets flags win', async () => {
      await file('.cachesim/config.json', JSON.stringify({ output: { addressFormat: 'decimal', stats: false } }));
      const config = await file('cache.cfg', '64 8 2 LRU WB L1\n');
      const trace = await file('trace.txt', 'R 8\n');

      await run('run', config, '-t', trace);
      expect(printed()).toBe('L1: read miss at address 8\nMemory: read hit at address 8\n');

      stdout.mockClear();
      await run('run', config, '-t', trace, '--stats', '-q');
      expect(printed()).toContain('Accesses: 1 (1 reads, 0 writes)\n');
    });

    it('verifies invariants with --check-invariants', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'W 0\nW 64\nR 128\nW 192\nR 0\nR 256\n');

      await run('run', config, '-t', trace, '--check-invariants', '-q');

      expect(process.exitCode).toBeUndefined();
      expect(printed()).toContain('Accesses: 6 (3 reads, 3 writes)\n');
    });

    it('exits with 1 on a malformed trace line', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0x10\nX 0x20\n');

      await run('run', config, '-t', trace);

      expect(process.exitCode).toBe(1);
      expect(printed()).toBe('');
      expect(reported()).toContain("TraceError: line 2: unknown operation 'X' (expected R or W)");
    });

    it('exits with 1 on an invalid configuration', async () => {
      const config = await file('cache.cfg', '64 8 3 LRU WB L1\n');
      const trace = await file('trace.txt', 'R 0\n');

      await run('run', config, '-t', trace);

      expect(process.exitCode).toBe(1);
      expect(reported()).toContain('ConfigError: line 1: L1: 8 blocks cannot be split into sets of 3 ways');
    });

    it('exits with 1 when an input file is missing', async () => {
      const trace = await file('trace.txt', 'R 0\n');
      const missing = path.join(dir, 'missing.cfg');

      await run('run', missing, '-t', trace);

      expect(process.exitCode).toBe(1);
      expect(reported()).toContain(`Failed to read configuration file: ${missing}`);
    });

    it('exits with 2 on invalid settings', async () => {
      await file('.cachesim/config.json', JSON.stringify({ output: { format: 'yaml' } }));
      const config = await file('cache.cfg', TWO_LEVEL);
      const trace = await file('trace.txt', 'R 0\n');

      await run('run', config, '-t', trace);

      expect(process.exitCode).toBe(2);
      expect(printed()).toBe('');
      expect(reported()).toContain('output.format: Invalid output format');
    });
  });

  describe('validate', () => {
    it('describes the geometry of every level', async () => {
      const config = await file('cache.cfg', TWO_LEVEL);

      await run('validate', config, '-f', 'json');

      expect(JSON.parse(printed())).toEqual({
        valid: true,
        levels: [
          { name: 'L1', policy: 'LRU', size: 64, blockSize: 8, blocks: 8, sets: 4, ways: 2, offsetBits: 3, indexBits: 2 },
          { name: 'L2', policy: 'FIFO', size: 128, blockSize: 8, blocks: 16, sets: 4, ways: 4, offsetBits: 3, indexBits: 2 },
        ],
      });
    });

    it('prints a geometry table in text mode', async () => {
      const config = await file('cache.cfg', '96 8 4 MRU WB L1\n');

      await run('validate', config);

      expect(printed()).toBe(
        'level  size  block size  blocks  sets  ways  policy  offset bits  index bits\n' +
          `${'─'.repeat(76)}\n` +
          'L1     96    8           12      3     4     MRU     3            -\n'
      );
    });

    it('exits with 1 on mismatched block sizes', async () => {
      const config = await file('cache.cfg', '64 8 2 LRU WB L1\n128 16 4 FIFO WB L2\n');

      await run('validate', config);

      expect(process.exitCode).toBe(1);
      expect(reported()).toContain('L2: block size 16 differs from L1 block size 8');
    });
  });
});
