/**
 * Trace Parser
 *
 * One access per line: `<op> <address>`, where op is R/W (or read/write, any
 * case) and the address is decimal or `0x` hexadecimal. Blank lines and
 * lines starting with `#` are skipped. Parsing stops at the first bad line.
 */

import type { AccessRecord, Operation } from '../types.js';

const OPERATION_TOKENS = new Map<string, Operation>([
  ['r', 'read'],
  ['read', 'read'],
  ['w', 'write'],
  ['write', 'write'],
]);

const HEX_PATTERN = /^0x[0-9a-f]+$/i;
const DECIMAL_PATTERN = /^\d+$/;

/**
 * Error thrown for a malformed trace line
 */
export class TraceError extends Error {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`line ${lineNumber}: ${message}`);
    this.name = 'TraceError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * Parse an address token.
 *
 * @returns the address, or null if the token is not a valid address
 */
export function parseAddress(token: string): number | null {
  let value: number;
  if (HEX_PATTERN.test(token)) {
    value = parseInt(token.slice(2), 16);
  } else if (DECIMAL_PATTERN.test(token)) {
    value = parseInt(token, 10);
  } else {
    return null;
  }
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parse one trace line.
 *
 * @returns the record, or null for blank and comment lines
 * @throws TraceError for anything else that is not a valid access
 */
export function parseTraceLine(line: string, lineNumber: number): AccessRecord | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return null;
  }

  const tokens = trimmed.split(/\s+/);
  if (tokens.length !== 2) {
    throw new TraceError(`expected '<op> <address>', got '${trimmed}'`, lineNumber, line);
  }
  const [opToken = '', addressToken = ''] = tokens;

  const operation = OPERATION_TOKENS.get(opToken.toLowerCase());
  if (!operation) {
    throw new TraceError(`unknown operation '${opToken}' (expected R or W)`, lineNumber, line);
  }

  if (addressToken.startsWith('-')) {
    throw new TraceError(`negative address '${addressToken}'`, lineNumber, line);
  }
  const address = parseAddress(addressToken);
  if (address === null) {
    throw new TraceError(`invalid address '${addressToken}'`, lineNumber, line);
  }

  return { operation, address };
}

/**
 * Parse a whole trace
 */
export function parseTrace(text: string): AccessRecord[] {
  const records: AccessRecord[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const record = parseTraceLine(line, index + 1);
    if (record) {
      records.push(record);
    }
  });
  return records;
}
