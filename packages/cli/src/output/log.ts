/**
 * Event log format — one line per level consulted.
 *
 *   L1: read miss at address 0x10 (evicted 0x30, writeback)
 *   L2: read miss at address 0x10 (evicted 0x50, writeback) [invalidated 0x50 above, writeback]
 *   Memory: read hit at address 0x10
 */

import type { AccessLogEntry, BlockDeparture, EventRecord } from 'cachesim-core';

export type AddressFormat = 'hex' | 'decimal';

export interface LogFormatOptions {
  addressFormat: AddressFormat;
}

export function formatAddress(address: number, format: AddressFormat): string {
  return format === 'hex' ? `0x${address.toString(16)}` : String(address);
}

function withWriteback(text: string, departure: BlockDeparture): string {
  return departure.writeback ? `${text}, writeback` : text;
}

/**
 * Render one event as a log line (without the trailing newline)
 */
export function formatEvent(event: EventRecord, options: LogFormatOptions): string {
  let line = `${event.level}: ${event.operation} ${event.outcome} at address ${formatAddress(event.address, options.addressFormat)}`;
  if (event.eviction) {
    const evicted = formatAddress(event.eviction.address, options.addressFormat);
    line += ` (${withWriteback(`evicted ${evicted}`, event.eviction)})`;
  }
  if (event.backInvalidation) {
    const invalidated = formatAddress(event.backInvalidation.address, options.addressFormat);
    line += ` [${withWriteback(`invalidated ${invalidated} above`, event.backInvalidation)}]`;
  }
  return line;
}

/**
 * Render every event of one access, one line each
 */
export function formatAccessLogEntry(entry: AccessLogEntry, options: LogFormatOptions): string {
  return entry.events.map((event) => formatEvent(event, options) + '\n').join('');
}

/**
 * Render a whole run's log
 */
export function formatAccessLog(entries: readonly AccessLogEntry[], options: LogFormatOptions): string {
  return entries.map((entry) => formatAccessLogEntry(entry, options)).join('');
}
