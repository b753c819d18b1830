/**
 * Trace Loader - Read a trace file
 */

import * as fs from 'node:fs/promises';

import { InputLoadError } from '../errors.js';
import { parseTrace } from './trace-parser.js';

import type { AccessRecord } from '../types.js';

/**
 * Read and parse a trace file.
 *
 * @throws InputLoadError when the file cannot be read
 * @throws TraceError on the first malformed record
 */
export async function loadTrace(filePath: string): Promise<AccessRecord[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputLoadError(
      `Failed to read trace file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
  return parseTrace(content);
}
