/**
 * Settings Validator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  SettingsValidationException,
  assertValidSettings,
  validateSettings,
} from '../../src/config/settings-validator.js';

describe('validateSettings', () => {
  it('accepts a complete settings document', () => {
    const result = validateSettings({
      output: { format: 'json', addressFormat: 'decimal', stats: false },
      simulation: { verifyInvariants: true },
    });

    expect(result).toEqual({
      valid: true,
      data: {
        output: { format: 'json', addressFormat: 'decimal', stats: false },
        simulation: { verifyInvariants: true },
      },
    });
  });

  it('accepts an empty document', () => {
    expect(validateSettings({})).toEqual({ valid: true, data: {} });
  });

  it('rejects a non-object document', () => {
    const result = validateSettings([1, 2]);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: '', message: 'Settings must be a JSON object', expected: 'object', actual: [1, 2] },
    ]);
  });

  it('collects every invalid field with its path', () => {
    const result = validateSettings({
      output: { format: 'xml', stats: 'yes', colour: true },
      simulation: { verifyInvariants: 1 },
      extra: {},
    });

    expect(result.valid).toBe(false);
    expect(result.errors?.map((error) => error.path)).toEqual([
      'extra',
      'output.format',
      'output.stats',
      'output.colour',
      'simulation.verifyInvariants',
    ]);
  });

  it('rejects a section that is not an object', () => {
    const result = validateSettings({ output: 'text' });
    expect(result.errors).toEqual([
      { path: 'output', message: 'Must be an object', expected: 'object', actual: 'text' },
    ]);
  });
});

describe('assertValidSettings', () => {
  it('returns the validated fragment', () => {
    expect(assertValidSettings({ output: { stats: true } }, 'settings.json')).toEqual({
      output: { stats: true },
    });
  });

  it('throws with formatted errors', () => {
    let caught: unknown;
    try {
      assertValidSettings({ output: { addressFormat: 'octal' } }, 'settings.json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SettingsValidationException);
    if (caught instanceof SettingsValidationException) {
      expect(caught.message).toBe('Invalid settings in settings.json');
      expect(caught.formatErrors()).toBe(
        '  - output.addressFormat: Invalid address format\n' +
          '    Expected: hex | decimal\n' +
          '    Got: "octal"'
      );
    }
  });
});
