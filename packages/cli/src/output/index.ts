/**
 * Output format registration — text log and summary, JSON report.
 */

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export { formatTable, type TableRow } from './table.js';
export { formatJson } from './json.js';
export {
  formatAccessLog,
  formatAccessLogEntry,
  formatAddress,
  formatEvent,
  type AddressFormat,
  type LogFormatOptions,
} from './log.js';
export { formatHitRate, formatSummary } from './summary.js';
