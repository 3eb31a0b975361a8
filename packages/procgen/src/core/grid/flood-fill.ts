/**
 * Flood fill algorithms for region detection and connectivity.
 */

import { DIRECTIONS_8, type Bounds, type Point } from "../geometry/types";
import { BitGrid } from "./bit-grid";
import type { CellType, ReadonlyGrid, Region } from "./types";

const BFS_DIRECTIONS_4: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
] as const;

const BFS_DIRECTIONS_8: ReadonlyArray<readonly [number, number]> =
  DIRECTIONS_8.map((d) => [d.x, d.y] as const);

// ============================================================================
// Packed Coordinate Utilities
// ============================================================================

/**
 * Pack x,y coordinates into a single number.
 * Format: (y << 16) | x - supports coordinates up to 65535.
 */
export function packCoord(x: number, y: number): number {
  return ((y << 16) | x) >>> 0;
}

export function unpackToPoint(packed: number): Point {
  return { x: packed & 0xffff, y: packed >>> 16 };
}

/**
 * Iterate over Region points without allocating Point objects.
 */
export function forEachRegionPoint(
  region: Region,
  callback: (x: number, y: number, index: number) => void,
): void {
  const packed = region.packedPoints;
  for (let i = 0; i < packed.length; i++) {
    const p = packed[i] ?? 0;
    callback(p & 0xffff, p >>> 16, i);
  }
}

// ============================================================================
// BFS
// ============================================================================

/**
 * Generic flood fill using BFS with configurable predicate.
 *
 * @param canVisit - Predicate to test if a cell can be visited
 * @param onVisit - Optional callback invoked for each visited cell
 * @param visited - Grid to mark visited cells in; cells already set are
 *   skipped. A fresh grid is allocated when omitted.
 * @returns The visited grid
 */
export function floodFillBFS(
  width: number,
  height: number,
  startX: number,
  startY: number,
  canVisit: (x: number, y: number) => boolean,
  diagonal = false,
  onVisit?: (x: number, y: number) => void,
  visited: BitGrid = new BitGrid(width, height),
): BitGrid {
  if (startX < 0 || startX >= width || startY < 0 || startY >= height) {
    return visited;
  }
  if (visited.get(startX, startY) || !canVisit(startX, startY)) {
    return visited;
  }

  const directions = diagonal ? BFS_DIRECTIONS_8 : BFS_DIRECTIONS_4;
  const queue: number[] = [startY * width + startX];
  let queueHead = 0;
  visited.set(startX, startY, true);

  while (queueHead < queue.length) {
    const coord = queue[queueHead++] ?? 0;
    const x = coord % width;
    const y = Math.floor(coord / width);
    onVisit?.(x, y);

    for (const [dx, dy] of directions) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
      if (visited.get(nx, ny)) continue;
      if (!canVisit(nx, ny)) continue;

      visited.set(nx, ny, true);
      queue.push(ny * width + nx);
    }
  }

  return visited;
}

/**
 * Connected regions of cells matching `predicate`, in row-major order of
 * their first cell.
 */
export function findRegions(
  grid: ReadonlyGrid,
  predicate: (cell: CellType) => boolean,
  config: { minSize?: number; diagonal?: boolean } = {},
): Region[] {
  const { minSize = 1, diagonal = false } = config;
  const { width, height } = grid;
  const seen = new BitGrid(width, height);
  const regions: Region[] = [];
  let nextId = 0;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (seen.get(x, y)) continue;
      if (!predicate(grid.getUnsafe(x, y))) continue;

      const points: number[] = [];
      let minX = x;
      let minY = y;
      let maxX = x;
      let maxY = y;

      floodFillBFS(
        width,
        height,
        x,
        y,
        (nx, ny) => predicate(grid.getUnsafe(nx, ny)),
        diagonal,
        (vx, vy) => {
          points.push(packCoord(vx, vy));
          if (vx < minX) minX = vx;
          if (vy < minY) minY = vy;
          if (vx > maxX) maxX = vx;
          if (vy > maxY) maxY = vy;
        },
        seen,
      );

      if (points.length >= minSize) {
        const bounds: Bounds = { minX, minY, maxX, maxY };
        regions.push({
          id: nextId++,
          packedPoints: Uint32Array.from(points),
          bounds,
          size: points.length,
        });
      }
    }
  }

  return regions;
}

/**
 * Check if `b` is reachable from `a` through cells accepted by `canVisit`
 * (4-connectivity).
 */
export function areConnected(
  grid: ReadonlyGrid,
  a: Point,
  b: Point,
  canVisit: (cell: CellType) => boolean,
): boolean {
  if (!grid.containsPoint(a) || !grid.containsPoint(b)) return false;

  const visited = floodFillBFS(grid.width, grid.height, a.x, a.y, (x, y) =>
    canVisit(grid.getUnsafe(x, y)),
  );
  return visited.get(b.x, b.y);
}
