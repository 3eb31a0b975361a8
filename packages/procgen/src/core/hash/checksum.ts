/**
 * Level checksum.
 *
 * Checksums carry a version prefix, `v{version}:{hash}`, so stored values can
 * be told apart when the hashed fields change.
 */

import type { ReadonlyGrid } from "../grid/types";
import { FNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

/**
 * Hash of grid dimensions, spawn and every cell byte.
 */
export function calculateLevelChecksum(grid: ReadonlyGrid): string {
  const hasher = new FNV64Hasher();
  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(grid.width);
  hasher.updateInt32(grid.height);
  hasher.updateInt32(grid.spawn.x);
  hasher.updateInt32(grid.spawn.y);
  hasher.updateBytes(grid.getRawDataCopy());
  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
