/**
 * Grid types for level generation.
 */

import type { Bounds, Point } from "../geometry/types";

/**
 * Tile kinds of a level.
 *
 * - `EMPTY`: open space the player moves through
 * - `HOOKABLE`: solid tile the grappling hook attaches to
 * - `FREEZE`: deadly buffer lining every tunnel
 * - `SPAWN`: player spawn tiles
 * - `START` / `FINISH`: race start and finish lines
 */
export const CellType = {
  EMPTY: 0,
  HOOKABLE: 1,
  FREEZE: 2,
  SPAWN: 3,
  START: 4,
  FINISH: 5,
} as const;

export type CellType = (typeof CellType)[keyof typeof CellType];

/**
 * Cells a player can occupy.
 */
export function isWalkable(cell: CellType): boolean {
  return (
    cell === CellType.EMPTY ||
    cell === CellType.SPAWN ||
    cell === CellType.START ||
    cell === CellType.FINISH
  );
}

/**
 * Markers placed by room carving; the walker stamp never erases them.
 */
export function isTerminalMarker(cell: CellType): boolean {
  return (
    cell === CellType.SPAWN ||
    cell === CellType.START ||
    cell === CellType.FINISH
  );
}

/**
 * Region represents a connected area in the grid.
 * Points are stored in packed format (y << 16 | x).
 */
export interface Region {
  readonly id: number;
  readonly packedPoints: Uint32Array;
  readonly bounds: Bounds;
  readonly size: number;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface. Validation and analysis take this type so the
 * compiler rejects accidental writes.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  readonly spawn: Point;

  isInBounds(x: number, y: number): boolean;
  containsPoint(p: Point): boolean;

  get(x: number, y: number): CellType;
  getAt(p: Point): CellType;
  getUnsafe(x: number, y: number): CellType;

  forEachNeighbor4(
    x: number,
    y: number,
    callback: (nx: number, ny: number, cell: CellType) => void,
  ): void;
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, cell: CellType) => void,
  ): void;

  getRawDataCopy(): Uint8Array;
  countCells(cellType: CellType): number;
  findAll(cellType: CellType): Point[];
}

/**
 * Mutable grid interface. Passes mutate the level grid in place.
 */
export interface MutableGrid extends ReadonlyGrid {
  spawn: Point;

  set(x: number, y: number, value: CellType): void;
  setUnsafe(x: number, y: number, value: CellType): void;

  setArea(
    topLeft: Point,
    bottomRight: Point,
    value: CellType,
    overwrite: boolean,
  ): void;
  setAreaBorder(
    topLeft: Point,
    bottomRight: Point,
    value: CellType,
    overwrite: boolean,
  ): void;
}
