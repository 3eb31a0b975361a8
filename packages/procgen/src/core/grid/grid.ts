/**
 * Level grid backed by a flat Uint8Array.
 */

import { GenerationError } from "@tunnelgen/contracts";
import type { Point } from "../geometry/types";
import { CellType, type MutableGrid } from "./types";

/**
 * 2D tile grid plus the spawn position of the level.
 *
 * Single-cell reads and writes are bounds checked and throw `OUT_OF_BOUNDS`.
 * The area primitives clamp to the grid instead, so a rectangle that sticks
 * out (or lies fully outside) is never an error.
 */
export class Grid implements MutableGrid {
  readonly width: number;
  readonly height: number;
  spawn: Point;
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    initialValue: CellType = CellType.HOOKABLE,
    spawn: Point = { x: 0, y: 0 },
  ) {
    if (width <= 0 || height <= 0) {
      throw GenerationError.configInvalid(
        `Invalid grid dimensions: ${width}x${height}`,
        { parameter: "dimensions", width, height },
      );
    }

    this.width = width;
    this.height = height;
    this.spawn = spawn;
    this.data = new Uint8Array(width * height);

    if (initialValue !== CellType.EMPTY) {
      this.data.fill(initialValue);
    }
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  containsPoint(p: Point): boolean {
    return this.isInBounds(p.x, p.y);
  }

  private assertInBounds(x: number, y: number, op: string): void {
    if (!this.isInBounds(x, y)) {
      throw GenerationError.outOfBounds(
        `Grid.${op}: (${x}, ${y}) is outside the ${this.width}x${this.height} grid`,
        { x, y, width: this.width, height: this.height },
      );
    }
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(x: number, y: number): CellType {
    this.assertInBounds(x, y, "get");
    return this.getUnsafe(x, y);
  }

  getAt(p: Point): CellType {
    return this.get(p.x, p.y);
  }

  set(x: number, y: number, value: CellType): void {
    this.assertInBounds(x, y, "set");
    this.data[y * this.width + x] = value;
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): CellType {
    return this.data[y * this.width + x] as CellType;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, value: CellType): void {
    this.data[y * this.width + x] = value;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Iterate over 4-directional neighbors without allocation.
   */
  forEachNeighbor4(
    x: number,
    y: number,
    callback: (nx: number, ny: number, cell: CellType) => void,
  ): void {
    if (x > 0) callback(x - 1, y, this.getUnsafe(x - 1, y));
    if (x < this.width - 1) callback(x + 1, y, this.getUnsafe(x + 1, y));
    if (y > 0) callback(x, y - 1, this.getUnsafe(x, y - 1));
    if (y < this.height - 1) callback(x, y + 1, this.getUnsafe(x, y + 1));
  }

  /**
   * Iterate over 8-directional neighbors without allocation.
   */
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, cell: CellType) => void,
  ): void {
    const minX = Math.max(0, x - 1);
    const maxX = Math.min(this.width - 1, x + 1);
    const minY = Math.max(0, y - 1);
    const maxY = Math.min(this.height - 1, y + 1);

    for (let ny = minY; ny <= maxY; ny++) {
      for (let nx = minX; nx <= maxX; nx++) {
        if (nx !== x || ny !== y) {
          callback(nx, ny, this.getUnsafe(nx, ny));
        }
      }
    }
  }

  // ===========================================================================
  // AREA OPERATIONS
  // ===========================================================================

  /**
   * Fill the inclusive rectangle `topLeft..bottomRight`, clamped to the grid.
   * Without `overwrite` only `HOOKABLE` cells are replaced.
   */
  setArea(
    topLeft: Point,
    bottomRight: Point,
    value: CellType,
    overwrite: boolean,
  ): void {
    const startX = Math.max(0, topLeft.x);
    const startY = Math.max(0, topLeft.y);
    const endX = Math.min(this.width - 1, bottomRight.x);
    const endY = Math.min(this.height - 1, bottomRight.y);

    for (let y = startY; y <= endY; y++) {
      for (let x = startX; x <= endX; x++) {
        this.writeCell(x, y, value, overwrite);
      }
    }
  }

  /**
   * Fill the one-cell ring of the inclusive rectangle, clamped to the grid.
   */
  setAreaBorder(
    topLeft: Point,
    bottomRight: Point,
    value: CellType,
    overwrite: boolean,
  ): void {
    const { x: left, y: top } = topLeft;
    const { x: right, y: bottom } = bottomRight;
    if (left > right || top > bottom) return;

    for (let x = left; x <= right; x++) {
      this.writeClipped(x, top, value, overwrite);
      this.writeClipped(x, bottom, value, overwrite);
    }
    for (let y = top + 1; y < bottom; y++) {
      this.writeClipped(left, y, value, overwrite);
      this.writeClipped(right, y, value, overwrite);
    }
  }

  private writeClipped(
    x: number,
    y: number,
    value: CellType,
    overwrite: boolean,
  ): void {
    if (this.isInBounds(x, y)) this.writeCell(x, y, value, overwrite);
  }

  private writeCell(
    x: number,
    y: number,
    value: CellType,
    overwrite: boolean,
  ): void {
    const index = y * this.width + x;
    if (overwrite || this.data[index] === CellType.HOOKABLE) {
      this.data[index] = value;
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): Grid {
    const result = new Grid(this.width, this.height, CellType.EMPTY, {
      ...this.spawn,
    });
    result.data.set(this.data);
    return result;
  }

  /**
   * Copy of the raw cell bytes, row-major.
   */
  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  countCells(cellType: CellType): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === cellType) count++;
    }
    return count;
  }

  findAll(cellType: CellType): Point[] {
    const points: Point[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getUnsafe(x, y) === cellType) {
          points.push({ x, y });
        }
      }
    }
    return points;
  }

  /**
   * Same dimensions, spawn and cell values.
   */
  equals(other: Grid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    if (this.spawn.x !== other.spawn.x || this.spawn.y !== other.spawn.y) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) {
        return false;
      }
    }
    return true;
  }
}
