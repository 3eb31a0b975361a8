import { GenerationError } from "@tunnelgen/contracts";
import { describe, expect, it } from "vitest";
import { BitGrid, CellType, Grid } from "../src/core/grid";
import {
  createKernel,
  isFuzzBand,
  kernelContains,
  kernelFromSize,
  kernelOffsets,
  kernelSizeToRadius,
  stampKernel,
  stampMask,
  withMinRadius,
} from "../src/core/kernel";

describe("kernel shape", () => {
  it("maps sizes to radii", () => {
    expect([1, 2, 3, 4, 5, 6].map(kernelSizeToRadius)).toEqual([
      0, 0, 1, 1, 2, 2,
    ]);
  });

  it("covers the full 3x3 at radius 1 for any circularity", () => {
    expect(kernelOffsets(createKernel(1, 0))).toHaveLength(9);
    expect(kernelOffsets(createKernel(1, 1))).toHaveLength(9);
  });

  it("drops the corners of a radius 2 disc", () => {
    const disc = createKernel(2, 0);
    expect(kernelOffsets(disc)).toHaveLength(21);
    expect(kernelContains(disc, 2, 2)).toBe(false);
    expect(kernelContains(disc, 2, 1)).toBe(true);
  });

  it("becomes a square at circularity 1", () => {
    expect(kernelOffsets(createKernel(2, 1))).toHaveLength(25);
  });

  it("trims three cells per corner of a radius 3 disc", () => {
    expect(kernelOffsets(createKernel(3, 0))).toHaveLength(37);
  });

  it("keeps the centre for a size 1 kernel", () => {
    expect(kernelOffsets(kernelFromSize(1, 0))).toEqual([{ x: 0, y: 0 }]);
  });

  it("rejects a zero size", () => {
    expect(() => kernelFromSize(0, 0)).toThrow(GenerationError);
  });

  it("rejects circularity outside [0, 1]", () => {
    expect(() => createKernel(1, 1.5)).toThrow(GenerationError);
  });

  it("raises the radius to a minimum", () => {
    expect(withMinRadius(kernelFromSize(2, 0.5), 1)).toEqual({
      radius: 1,
      circularity: 0.5,
    });
  });

  it("places the fuzz band just outside the kernel", () => {
    const kernel = createKernel(1, 0);
    expect(isFuzzBand(kernel, 2, 0)).toBe(true);
    expect(isFuzzBand(kernel, 2, 1)).toBe(false);
    expect(isFuzzBand(kernel, 1, 1)).toBe(false);
  });
});

describe("stampKernel", () => {
  it("carves a 3x3 square", () => {
    const grid = new Grid(7, 7);
    const written = stampKernel(
      grid,
      { x: 3, y: 3 },
      createKernel(1, 0),
      CellType.EMPTY,
      "carve",
    );
    expect(written).toBe(9);
    expect(grid.countCells(CellType.EMPTY)).toBe(9);
  });

  it("buffer policy only replaces hookable cells", () => {
    const grid = new Grid(7, 7);
    grid.set(3, 3, CellType.EMPTY);
    const written = stampKernel(
      grid,
      { x: 3, y: 3 },
      createKernel(1, 0),
      CellType.FREEZE,
      "buffer",
    );
    expect(written).toBe(8);
    expect(grid.get(3, 3)).toBe(CellType.EMPTY);
  });

  it("carve policy keeps terminal markers", () => {
    const grid = new Grid(7, 7);
    grid.set(3, 3, CellType.SPAWN);
    stampKernel(grid, { x: 3, y: 3 }, createKernel(1, 0), CellType.EMPTY, "carve");
    expect(grid.get(3, 3)).toBe(CellType.SPAWN);
    expect(grid.countCells(CellType.EMPTY)).toBe(8);
  });

  it("clips at the grid edge", () => {
    const grid = new Grid(7, 7);
    const written = stampKernel(
      grid,
      { x: 0, y: 0 },
      createKernel(1, 0),
      CellType.EMPTY,
      "carve",
    );
    expect(written).toBe(4);
  });

  it("skips locked cells", () => {
    const grid = new Grid(7, 7);
    const locked = new BitGrid(7, 7);
    locked.set(3, 3, true);
    stampKernel(grid, { x: 3, y: 3 }, createKernel(1, 0), CellType.EMPTY, "carve", {
      locked,
    });
    expect(grid.get(3, 3)).toBe(CellType.HOOKABLE);
    expect(grid.countCells(CellType.EMPTY)).toBe(8);
  });

  it("adds fuzz band cells the chance accepts", () => {
    const grid = new Grid(7, 7);
    const written = stampKernel(
      grid,
      { x: 3, y: 3 },
      createKernel(1, 0),
      CellType.EMPTY,
      "carve",
      { edgeFuzz: { probability: 1, chance: () => true } },
    );
    // 3x3 plus the four cells two steps away along the axes
    expect(written).toBe(13);
    expect(grid.get(5, 3)).toBe(CellType.EMPTY);
    expect(grid.get(5, 4)).toBe(CellType.HOOKABLE);
  });

  it("ignores fuzz with zero probability", () => {
    const grid = new Grid(7, 7);
    let calls = 0;
    stampKernel(grid, { x: 3, y: 3 }, createKernel(1, 0), CellType.EMPTY, "carve", {
      edgeFuzz: {
        probability: 0,
        chance: () => {
          calls++;
          return true;
        },
      },
    });
    expect(calls).toBe(0);
    expect(grid.countCells(CellType.EMPTY)).toBe(9);
  });
});

describe("stampMask", () => {
  it("marks a disc clipped to the mask", () => {
    const mask = new BitGrid(5, 5);
    stampMask(mask, { x: 0, y: 0 }, createKernel(2, 0));
    // quarter of the radius 2 disc: 3x3 minus the (2, 2) corner
    expect(mask.count()).toBe(8);
    expect(mask.get(2, 2)).toBe(false);
  });
});
