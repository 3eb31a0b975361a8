/**
 * BitGrid - boolean grid using bit packing, 32 cells per Uint32 element.
 * Used for visited sets and the walker's position locks.
 */

import type { Point } from "../geometry/types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Fast popcount for a 32-bit word using SWAR bit tricks.
 */
function popcount32(value: number): number {
  let n = value >>> 0;
  n = n - ((n >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return ((((n + (n >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24) >>> 0;
}

export class BitGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint32Array;

  constructor(width: number, height: number) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint32Array(Math.ceil((width * height) / 32));
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Bit at coordinates; false outside the grid.
   */
  get(x: number, y: number): boolean {
    if (!this.isInBounds(x, y)) return false;
    const index = y * this.width + x;
    const value = this.data[index >>> 5] ?? 0;
    return (value & (1 << (index & 31))) !== 0;
  }

  set(x: number, y: number, value: boolean): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `BitGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    const index = y * this.width + x;
    const arrayIndex = index >>> 5;
    const current = this.data[arrayIndex] ?? 0;
    const mask = 1 << (index & 31);
    this.data[arrayIndex] = value ? current | mask : current & ~mask;
  }

  /**
   * Number of set bits (padding bits are never set).
   */
  count(): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      count += popcount32(this.data[i] ?? 0);
    }
    return count;
  }

  clone(): BitGrid {
    const result = new BitGrid(this.width, this.height);
    result.data.set(this.data);
    return result;
  }

  findSet(): Point[] {
    const points: Point[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.get(x, y)) {
          points.push({ x, y });
        }
      }
    }
    return points;
  }
}
