/**
 * Config Loader - Read a cache configuration file
 */

import * as fs from 'node:fs/promises';

import { InputLoadError } from '../errors.js';
import { parseCacheConfig } from './config-parser.js';

import type { CacheConfig } from '../types.js';

/**
 * Read and parse a configuration file.
 *
 * @throws InputLoadError when the file cannot be read
 * @throws ConfigError when its content is invalid
 */
export async function loadCacheConfig(filePath: string): Promise<CacheConfig[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputLoadError(
      `Failed to read configuration file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
  return parseCacheConfig(content);
}
