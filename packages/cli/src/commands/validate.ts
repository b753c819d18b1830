/**
 * Validate Command - cachesim validate <config>
 *
 * Parse a cache configuration and print the derived geometry of every level.
 */

import { Command, Option } from 'commander';

import { describeGeometry, loadCacheConfig, type GeometryDescription } from 'cachesim-core';

import { isOutputFormat } from '../config/settings-validator.js';
import { OUTPUT_FORMATS, formatJson, formatTable, type TableRow } from '../output/index.js';
import { status } from '../ui/spinner.js';
import { reportFailure } from './run.js';

export interface ValidateOptions {
  /** Output format */
  format?: string;
  /** Enable verbose output */
  verbose?: boolean;
}

function geometryRow(geometry: GeometryDescription): TableRow {
  return {
    level: geometry.name,
    size: geometry.size,
    'block size': geometry.blockSize,
    blocks: geometry.blocks,
    sets: geometry.sets,
    ways: geometry.ways,
    policy: geometry.policy,
    'offset bits': geometry.offsetBits,
    'index bits': geometry.indexBits ?? '-',
  };
}

/**
 * Validate command implementation
 */
async function validateAction(configPath: string, options: ValidateOptions): Promise<void> {
  const format = isOutputFormat(options.format) ? options.format : 'text';
  try {
    const configs = await loadCacheConfig(configPath);
    const geometries = configs.map(describeGeometry);

    if (format === 'json') {
      process.stdout.write(formatJson({ valid: true, levels: geometries }));
      return;
    }

    status.success(`${configPath}: ${configs.length} cache level(s)`);
    process.stdout.write(formatTable(geometries.map(geometryRow)));
  } catch (error) {
    reportFailure(error, options.verbose ?? false);
  }
}

/**
 * Build the validate command
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check a cache configuration and show its geometry')
    .argument('<config>', 'Cache configuration file, one level per line')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--verbose', 'Enable verbose output')
    .action(validateAction);
}
