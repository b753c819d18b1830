/**
 * Address Decoder - Split byte addresses into tag, set index and offset
 */

import type { CacheConfig, CacheGeometry } from '../types.js';

/**
 * Components of a decoded address
 */
export interface DecodedAddress {
  tag: number;
  setIndex: number;
  offset: number;
}

/**
 * Derive the set geometry of a level from its configuration
 */
export function geometryOf(config: CacheConfig): CacheGeometry {
  return {
    blockSize: config.blockSize,
    numSets: config.size / config.blockSize / config.associativity,
    associativity: config.associativity,
  };
}

/**
 * Decode an address against a geometry. Any positive set count is valid,
 * not only powers of two.
 */
export function decodeAddress(address: number, geometry: CacheGeometry): DecodedAddress {
  const blockNumber = Math.floor(address / geometry.blockSize);
  return {
    tag: Math.floor(blockNumber / geometry.numSets),
    setIndex: blockNumber % geometry.numSets,
    offset: address % geometry.blockSize,
  };
}

/**
 * Rebuild the block-aligned address of a line from its tag and set
 */
export function blockAddress(tag: number, setIndex: number, geometry: CacheGeometry): number {
  return (tag * geometry.numSets + setIndex) * geometry.blockSize;
}
