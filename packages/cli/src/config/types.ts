/**
 * CLI settings types
 */

import type { AddressFormat, OutputFormat } from '../output/index.js';

export interface OutputSettings {
  /** Log and summary as text, or one JSON document */
  format: OutputFormat;
  /** How addresses are printed in the text log */
  addressFormat: AddressFormat;
  /** Print the end-of-run summary */
  stats: boolean;
}

export interface SimulationSettings {
  /** Check hierarchy invariants after every access */
  verifyInvariants: boolean;
}

export interface CliSettings {
  output: OutputSettings;
  simulation: SimulationSettings;
}

/**
 * Settings fragment from one source (file, environment or flags)
 */
export interface PartialCliSettings {
  output?: Partial<OutputSettings>;
  simulation?: Partial<SimulationSettings>;
}
