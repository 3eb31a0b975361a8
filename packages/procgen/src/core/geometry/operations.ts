/**
 * Geometry operations - pure functions on points and shifts.
 */

import {
  type Bounds,
  type Point,
  SHIFT_VECTORS,
  type ShiftDirection,
} from "./types";

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

/**
 * True when two inclusive bounds share at least one cell.
 */
export function boundsOverlap(a: Bounds, b: Bounds): boolean {
  return (
    a.minX <= b.maxX && b.minX <= a.maxX && a.minY <= b.maxY && b.minY <= a.maxY
  );
}

export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function euclideanDistance(a: Point, b: Point): number {
  return Math.sqrt(squaredDistance(a, b));
}

/**
 * Chebyshev (chessboard) distance between two points
 */
export function chebyshevDistance(a: Point, b: Point): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function shiftPoint(p: Point, direction: ShiftDirection): Point {
  return addPoints(p, SHIFT_VECTORS[direction]);
}

/**
 * True when both shifts move along the same axis.
 */
export function areCollinear(a: ShiftDirection, b: ShiftDirection): boolean {
  const horizontal = (d: ShiftDirection) => d === "left" || d === "right";
  return horizontal(a) === horizontal(b);
}

export function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
