import { describe, expect, it } from "vitest";
import { BitGrid } from "../src/core/grid/bit-grid";

describe("BitGrid", () => {
  it("sets and clears bits", () => {
    const bits = new BitGrid(40, 3);
    bits.set(33, 1, true);
    expect(bits.get(33, 1)).toBe(true);
    expect(bits.count()).toBe(1);
    bits.set(33, 1, false);
    expect(bits.get(33, 1)).toBe(false);
  });

  it("reads false outside the grid", () => {
    const bits = new BitGrid(4, 4);
    expect(bits.get(-1, 0)).toBe(false);
    expect(bits.get(4, 0)).toBe(false);
  });

  it("lists set cells in row-major order", () => {
    const bits = new BitGrid(4, 4);
    bits.set(3, 2, true);
    bits.set(1, 0, true);
    expect(bits.findSet()).toEqual([
      { x: 1, y: 0 },
      { x: 3, y: 2 },
    ]);
  });

  it("clones independently", () => {
    const bits = new BitGrid(4, 4);
    bits.set(0, 0, true);
    const copy = bits.clone();
    copy.set(1, 1, true);
    expect(bits.count()).toBe(1);
    expect(copy.count()).toBe(2);
  });
});
