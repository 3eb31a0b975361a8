/**
 * Grid class unit tests
 */

import { GenerationError } from "@tunnelgen/contracts";
import { describe, expect, it } from "vitest";
import { CellType, Grid } from "../src/core/grid";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (GenerationError.isGenerationError(error)) return error.code;
    throw error;
  }
  return undefined;
}

describe("Grid", () => {
  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = new Grid(100, 50);
      expect(grid.width).toBe(100);
      expect(grid.height).toBe(50);
    });

    it("starts fully hookable by default", () => {
      const grid = new Grid(10, 10);
      expect(grid.countCells(CellType.HOOKABLE)).toBe(100);
    });

    it("keeps the spawn position", () => {
      const grid = new Grid(10, 10, CellType.HOOKABLE, { x: 3, y: 4 });
      expect(grid.spawn).toEqual({ x: 3, y: 4 });
    });

    it("rejects non-positive dimensions", () => {
      expect(errorCode(() => new Grid(0, 10))).toBe("CONFIG_INVALID");
    });
  });

  describe("get/set operations", () => {
    it("sets and gets values correctly", () => {
      const grid = new Grid(10, 10);
      grid.set(5, 5, CellType.FREEZE);
      expect(grid.get(5, 5)).toBe(CellType.FREEZE);
      expect(grid.getAt({ x: 5, y: 5 })).toBe(CellType.FREEZE);
    });

    it("throws OUT_OF_BOUNDS for reads outside the grid", () => {
      const grid = new Grid(10, 10);
      expect(errorCode(() => grid.get(-1, 0))).toBe("OUT_OF_BOUNDS");
      expect(errorCode(() => grid.get(0, 10))).toBe("OUT_OF_BOUNDS");
    });

    it("throws OUT_OF_BOUNDS for writes outside the grid", () => {
      const grid = new Grid(10, 10);
      expect(errorCode(() => grid.set(10, 0, CellType.EMPTY))).toBe(
        "OUT_OF_BOUNDS",
      );
    });
  });

  describe("setArea", () => {
    it("fills an inclusive rectangle", () => {
      const grid = new Grid(10, 10);
      grid.setArea({ x: 2, y: 3 }, { x: 4, y: 4 }, CellType.EMPTY, true);
      expect(grid.countCells(CellType.EMPTY)).toBe(6);
      expect(grid.get(4, 4)).toBe(CellType.EMPTY);
      expect(grid.get(5, 4)).toBe(CellType.HOOKABLE);
    });

    it("clamps rectangles sticking out of the grid", () => {
      const grid = new Grid(5, 5);
      grid.setArea({ x: -2, y: -2 }, { x: 1, y: 1 }, CellType.EMPTY, true);
      expect(grid.countCells(CellType.EMPTY)).toBe(4);
    });

    it("ignores rectangles fully outside the grid", () => {
      const grid = new Grid(5, 5);
      grid.setArea({ x: 7, y: 7 }, { x: 9, y: 9 }, CellType.EMPTY, true);
      expect(grid.countCells(CellType.EMPTY)).toBe(0);
    });

    it("only replaces hookable cells without overwrite", () => {
      const grid = new Grid(5, 5);
      grid.set(0, 0, CellType.FREEZE);
      grid.setArea({ x: 0, y: 0 }, { x: 1, y: 0 }, CellType.START, false);
      expect(grid.get(0, 0)).toBe(CellType.FREEZE);
      expect(grid.get(1, 0)).toBe(CellType.START);
    });
  });

  describe("setAreaBorder", () => {
    it("writes the ring only", () => {
      const grid = new Grid(5, 5);
      grid.setAreaBorder({ x: 1, y: 1 }, { x: 3, y: 3 }, CellType.FINISH, true);
      expect(grid.countCells(CellType.FINISH)).toBe(8);
      expect(grid.get(2, 2)).toBe(CellType.HOOKABLE);
    });

    it("clips the ring at the grid edge", () => {
      const grid = new Grid(5, 5);
      grid.setAreaBorder(
        { x: -1, y: -1 },
        { x: 1, y: 1 },
        CellType.FINISH,
        true,
      );
      expect(grid.findAll(CellType.FINISH)).toEqual([
        { x: 1, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 },
      ]);
    });

    it("leaves non-hookable cells without overwrite", () => {
      const grid = new Grid(5, 5);
      grid.set(1, 1, CellType.EMPTY);
      grid.setAreaBorder({ x: 1, y: 1 }, { x: 3, y: 3 }, CellType.START, false);
      expect(grid.get(1, 1)).toBe(CellType.EMPTY);
      expect(grid.countCells(CellType.START)).toBe(7);
    });
  });

  describe("neighbors", () => {
    it("visits 3 neighbors in a corner", () => {
      const grid = new Grid(5, 5);
      let count = 0;
      grid.forEachNeighbor8(0, 0, () => count++);
      expect(count).toBe(3);
    });

    it("visits 4 neighbors in the middle", () => {
      const grid = new Grid(5, 5);
      const seen: string[] = [];
      grid.forEachNeighbor4(2, 2, (x, y) => seen.push(`${x},${y}`));
      expect(seen).toEqual(["1,2", "3,2", "2,1", "2,3"]);
    });
  });

  describe("utility", () => {
    it("clones cells and spawn", () => {
      const grid = new Grid(5, 5, CellType.HOOKABLE, { x: 1, y: 2 });
      grid.set(3, 3, CellType.EMPTY);
      const copy = grid.clone();
      expect(copy.equals(grid)).toBe(true);

      copy.set(0, 0, CellType.FREEZE);
      expect(grid.get(0, 0)).toBe(CellType.HOOKABLE);
      expect(copy.equals(grid)).toBe(false);
    });

    it("compares spawn positions in equals", () => {
      const a = new Grid(5, 5, CellType.HOOKABLE, { x: 1, y: 1 });
      const b = new Grid(5, 5, CellType.HOOKABLE, { x: 2, y: 1 });
      expect(a.equals(b)).toBe(false);
    });
  });
});
