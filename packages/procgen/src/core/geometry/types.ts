/**
 * Core geometry types for level generation.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates. Structurally identical to the
 * `Position` of `@tunnelgen/contracts`.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Bounding box defined by inclusive min/max corners
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Unit moves the walker can take. `y` grows downwards.
 */
export type ShiftDirection = "up" | "right" | "down" | "left";

/**
 * Stable order used to break ties between equally good shifts.
 */
export const SHIFT_DIRECTIONS: readonly ShiftDirection[] = [
  "up",
  "right",
  "down",
  "left",
];

export const SHIFT_VECTORS: Readonly<Record<ShiftDirection, Point>> = {
  up: { x: 0, y: -1 },
  right: { x: 1, y: 0 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
};

export const DIRECTIONS_8 = [
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
  { x: -1, y: 0 }, // W
  { x: 1, y: 0 }, // E
  { x: -1, y: 1 }, // SW
  { x: 0, y: 1 }, // S
  { x: 1, y: 1 }, // SE
] as const;
