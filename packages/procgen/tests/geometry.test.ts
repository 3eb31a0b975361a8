import { describe, expect, it } from "vitest";
import {
  areCollinear,
  boundsOverlap,
  chebyshevDistance,
  euclideanDistance,
  shiftPoint,
  squaredDistance,
} from "../src/core/geometry";
import { rankShifts } from "../src/walker/shifts";

describe("geometry", () => {
  it("computes distances", () => {
    const a = { x: 1, y: 2 };
    const b = { x: 4, y: 6 };
    expect(squaredDistance(a, b)).toBe(25);
    expect(euclideanDistance(a, b)).toBe(5);
    expect(chebyshevDistance(a, b)).toBe(4);
  });

  it("shifts with y growing downwards", () => {
    expect(shiftPoint({ x: 5, y: 5 }, "up")).toEqual({ x: 5, y: 4 });
    expect(shiftPoint({ x: 5, y: 5 }, "left")).toEqual({ x: 4, y: 5 });
  });

  it("detects overlapping bounds", () => {
    const a = { minX: 0, minY: 0, maxX: 4, maxY: 4 };
    expect(boundsOverlap(a, { minX: 4, minY: 4, maxX: 8, maxY: 8 })).toBe(true);
    expect(boundsOverlap(a, { minX: 5, minY: 0, maxX: 8, maxY: 4 })).toBe(false);
    expect(boundsOverlap(a, { minX: 1, minY: 1, maxX: 2, maxY: 2 })).toBe(true);
  });

  it("detects collinear shifts", () => {
    expect(areCollinear("up", "down")).toBe(true);
    expect(areCollinear("left", "left")).toBe(true);
    expect(areCollinear("up", "right")).toBe(false);
  });
});

describe("rankShifts", () => {
  it("orders shifts by remaining distance to the goal", () => {
    expect(rankShifts({ x: 0, y: 0 }, { x: 10, y: 3 })).toEqual([
      "right",
      "down",
      "up",
      "left",
    ]);
  });

  it("breaks ties in up, right, down, left order", () => {
    // right and down both leave 9 + 16 = 25
    expect(rankShifts({ x: 0, y: 0 }, { x: 4, y: 4 })).toEqual([
      "right",
      "down",
      "up",
      "left",
    ]);
    // goal reached: every shift leaves 1
    expect(rankShifts({ x: 2, y: 2 }, { x: 2, y: 2 })).toEqual([
      "up",
      "right",
      "down",
      "left",
    ]);
  });
});
