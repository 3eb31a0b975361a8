/**
 * Flood fill unit tests
 */

import { describe, expect, it } from "vitest";
import {
  areConnected,
  BitGrid,
  CellType,
  findRegions,
  floodFillBFS,
  Grid,
  isWalkable,
  packCoord,
  unpackToPoint,
} from "../src/core/grid";

describe("packed coordinates", () => {
  it("round-trips a point", () => {
    expect(unpackToPoint(packCoord(5, 7))).toEqual({ x: 5, y: 7 });
  });
});

describe("floodFillBFS", () => {
  it("fills the open area only", () => {
    const grid = new Grid(10, 10);
    grid.setArea({ x: 2, y: 2 }, { x: 4, y: 4 }, CellType.EMPTY, true);

    const visited = floodFillBFS(10, 10, 3, 3, (x, y) =>
      grid.getUnsafe(x, y) === CellType.EMPTY,
    );
    expect(visited.count()).toBe(9);
  });

  it("returns nothing for a blocked start", () => {
    const visited = floodFillBFS(5, 5, 0, 0, () => false);
    expect(visited.count()).toBe(0);
  });

  it("gives every fill its own visited grid", () => {
    const first = floodFillBFS(5, 5, 0, 0, (x) => x < 2);
    const second = floodFillBFS(5, 5, 4, 4, (x) => x > 2);

    expect(second).not.toBe(first);
    expect(first.count()).toBe(10);
    expect(second.count()).toBe(10);
    expect(first.get(4, 4)).toBe(false);
  });

  it("skips cells already marked in a shared grid", () => {
    const shared = new BitGrid(5, 1);
    shared.set(2, 0, true);
    const visited = floodFillBFS(5, 1, 0, 0, () => true, false, undefined, shared);

    expect(visited).toBe(shared);
    // (0..1) filled, (2) blocks the way to (3..4)
    expect(visited.findSet()).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
    ]);
  });
});

describe("findRegions", () => {
  it("reports size and bounds", () => {
    const grid = new Grid(10, 10);
    grid.setArea({ x: 1, y: 2 }, { x: 3, y: 3 }, CellType.EMPTY, true);

    const regions = findRegions(grid, (cell) => cell === CellType.EMPTY);
    expect(regions).toHaveLength(1);
    expect(regions[0]?.size).toBe(6);
    expect(regions[0]?.bounds).toEqual({ minX: 1, minY: 2, maxX: 3, maxY: 3 });
  });

  it("joins diagonal cells only with 8-connectivity", () => {
    const grid = new Grid(5, 5);
    grid.set(0, 0, CellType.FREEZE);
    grid.set(1, 1, CellType.FREEZE);
    const isFreeze = (cell: CellType) => cell === CellType.FREEZE;

    expect(findRegions(grid, isFreeze)).toHaveLength(2);
    expect(findRegions(grid, isFreeze, { diagonal: true })).toHaveLength(1);
  });

  it("drops regions under the minimum size", () => {
    const grid = new Grid(5, 5);
    grid.set(0, 0, CellType.EMPTY);
    grid.setArea({ x: 3, y: 3 }, { x: 4, y: 4 }, CellType.EMPTY, true);

    const regions = findRegions(grid, (cell) => cell === CellType.EMPTY, {
      minSize: 2,
    });
    expect(regions.map((region) => region.size)).toEqual([4]);
  });
});

describe("areConnected", () => {
  it("follows walkable cells", () => {
    const grid = new Grid(10, 5);
    grid.setArea({ x: 0, y: 2 }, { x: 9, y: 2 }, CellType.EMPTY, true);
    grid.set(5, 2, CellType.SPAWN);

    expect(areConnected(grid, { x: 0, y: 2 }, { x: 9, y: 2 }, isWalkable)).toBe(
      true,
    );
  });

  it("stops at freeze and hookable cells", () => {
    const grid = new Grid(10, 5);
    grid.setArea({ x: 0, y: 2 }, { x: 9, y: 2 }, CellType.EMPTY, true);
    grid.set(5, 2, CellType.FREEZE);

    expect(areConnected(grid, { x: 0, y: 2 }, { x: 9, y: 2 }, isWalkable)).toBe(
      false,
    );
  });

  it("is false for points outside the grid", () => {
    const grid = new Grid(5, 5, CellType.EMPTY);
    expect(areConnected(grid, { x: 0, y: 0 }, { x: 5, y: 0 }, isWalkable)).toBe(
      false,
    );
  });
});
