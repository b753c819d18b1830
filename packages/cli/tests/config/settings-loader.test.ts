/**
 * Settings Loader Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getSettingsPath,
  loadSettings,
  mergeSettings,
  readEnvOverrides,
} from '../../src/config/settings-loader.js';
import { SettingsValidationException } from '../../src/config/settings-validator.js';
import { DEFAULT_SETTINGS } from '../../src/config/defaults.js';

describe('mergeSettings', () => {
  it('overrides only the keys a fragment sets', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, { output: { addressFormat: 'decimal' } });
    expect(merged).toEqual({
      output: { format: 'text', addressFormat: 'decimal', stats: true },
      simulation: { verifyInvariants: false },
    });
  });

  it('leaves the base settings untouched', () => {
    mergeSettings(DEFAULT_SETTINGS, { output: { stats: false }, simulation: { verifyInvariants: true } });
    expect(DEFAULT_SETTINGS.output.stats).toBe(true);
    expect(DEFAULT_SETTINGS.simulation.verifyInvariants).toBe(false);
  });
});

describe('readEnvOverrides', () => {
  it('reads every supported variable', () => {
    expect(
      readEnvOverrides({
        CACHESIM_FORMAT: 'json',
        CACHESIM_ADDRESS_FORMAT: 'decimal',
        CACHESIM_STATS: 'no',
        CACHESIM_VERIFY_INVARIANTS: '1',
      })
    ).toEqual({
      output: { format: 'json', addressFormat: 'decimal', stats: false },
      simulation: { verifyInvariants: true },
    });
  });

  it('ignores unrelated variables', () => {
    expect(readEnvOverrides({ HOME: '/tmp', CACHESIM: 'x' })).toEqual({ output: {}, simulation: {} });
  });

  it('rejects unusable values', () => {
    expect(() => readEnvOverrides({ CACHESIM_STATS: 'maybe' })).toThrow(SettingsValidationException);
  });
});

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cachesim-settings-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeSettings(content: string): Promise<void> {
    const file = getSettingsPath(dir);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }

  it('falls back to the defaults without a settings file', async () => {
    expect(await loadSettings({ rootDir: dir, env: {} })).toEqual(DEFAULT_SETTINGS);
  });

  it('applies the settings file over the defaults', async () => {
    await writeSettings(JSON.stringify({ output: { addressFormat: 'decimal' } }));

    const settings = await loadSettings({ rootDir: dir, env: {} });
    expect(settings.output).toEqual({ format: 'text', addressFormat: 'decimal', stats: true });
  });

  it('lets the environment win over the settings file', async () => {
    await writeSettings(JSON.stringify({ output: { format: 'text', stats: true } }));

    const settings = await loadSettings({ rootDir: dir, env: { CACHESIM_FORMAT: 'json' } });
    expect(settings.output.format).toBe('json');
    expect(settings.output.stats).toBe(true);
  });

  it('skips the environment when asked', async () => {
    const settings = await loadSettings({
      rootDir: dir,
      env: { CACHESIM_FORMAT: 'json' },
      applyEnvOverrides: false,
    });
    expect(settings.output.format).toBe('text');
  });

  it('rejects malformed JSON', async () => {
    await writeSettings('{ "output": ');
    await expect(loadSettings({ rootDir: dir, env: {} })).rejects.toBeInstanceOf(SettingsValidationException);
  });

  it('rejects invalid values', async () => {
    await writeSettings(JSON.stringify({ simulation: { verifyInvariants: 'always' } }));
    await expect(loadSettings({ rootDir: dir, env: {} })).rejects.toMatchObject({
      errors: [{ path: 'simulation.verifyInvariants', message: 'Must be a boolean' }],
    });
  });
});
