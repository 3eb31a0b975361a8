/**
 * Applying kernels to grids.
 */

import type { Point } from "../geometry/types";
import type { BitGrid } from "../grid/bit-grid";
import {
  CellType,
  isTerminalMarker,
  type MutableGrid,
} from "../grid/types";
import { isFuzzBand, type Kernel, kernelContains } from "./kernel";

/**
 * Which cells a stamp may replace.
 *
 * - `carve`: anything but spawn/start/finish markers (inner kernel)
 * - `buffer`: only `HOOKABLE`, so a buffer never downgrades carved space
 *   (outer kernel)
 */
export type OverwritePolicy = "carve" | "buffer";

export interface EdgeFuzz {
  readonly probability: number;
  readonly chance: (probability: number) => boolean;
}

export interface StampOptions {
  /** Cells that must not be written */
  readonly locked?: BitGrid;
  readonly edgeFuzz?: EdgeFuzz;
}

function canOverwrite(policy: OverwritePolicy, current: CellType): boolean {
  switch (policy) {
    case "carve":
      return !isTerminalMarker(current);
    case "buffer":
      return current === CellType.HOOKABLE;
  }
}

/**
 * Stamp `kernel` around `center`, clipping at the grid edge.
 *
 * @returns Number of cells written
 */
export function stampKernel(
  grid: MutableGrid,
  center: Point,
  kernel: Kernel,
  value: CellType,
  policy: OverwritePolicy,
  options: StampOptions = {},
): number {
  const { locked, edgeFuzz } = options;
  const fuzz = edgeFuzz && edgeFuzz.probability > 0 ? edgeFuzz : undefined;
  const reach = fuzz ? kernel.radius + 1 : kernel.radius;
  let written = 0;

  for (let dy = -reach; dy <= reach; dy++) {
    const y = center.y + dy;
    if (y < 0 || y >= grid.height) continue;

    for (let dx = -reach; dx <= reach; dx++) {
      const x = center.x + dx;
      if (x < 0 || x >= grid.width) continue;
      if (locked?.get(x, y)) continue;

      const member =
        kernelContains(kernel, dx, dy) ||
        (fuzz !== undefined &&
          isFuzzBand(kernel, dx, dy) &&
          fuzz.chance(fuzz.probability));
      if (!member) continue;

      if (canOverwrite(policy, grid.getUnsafe(x, y))) {
        grid.setUnsafe(x, y, value);
        written++;
      }
    }
  }

  return written;
}

/**
 * Mark the kernel's cells in a bit mask, clipped to the mask bounds.
 */
export function stampMask(mask: BitGrid, center: Point, kernel: Kernel): void {
  const r = kernel.radius;
  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      const x = center.x + dx;
      const y = center.y + dy;
      if (mask.isInBounds(x, y) && kernelContains(kernel, dx, dy)) {
        mask.set(x, y, true);
      }
    }
  }
}
