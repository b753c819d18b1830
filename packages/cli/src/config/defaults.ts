/**
 * Default CLI settings
 */

import type { CliSettings } from './types.js';

export const DEFAULT_SETTINGS: CliSettings = {
  output: {
    format: 'text',
    addressFormat: 'hex',
    stats: true,
  },
  simulation: {
    verifyInvariants: false,
  },
};
