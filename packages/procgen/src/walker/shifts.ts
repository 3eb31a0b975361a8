import { shiftPoint, squaredDistance } from "../core/geometry/operations";
import {
  type Point,
  SHIFT_DIRECTIONS,
  type ShiftDirection,
} from "../core/geometry/types";

/**
 * The four shifts ordered by the squared distance to `goal` they leave,
 * best first. Ties keep the up, right, down, left order.
 */
export function rankShifts(position: Point, goal: Point): ShiftDirection[] {
  return SHIFT_DIRECTIONS.map((direction, order) => ({
    direction,
    order,
    distance: squaredDistance(shiftPoint(position, direction), goal),
  }))
    .sort((a, b) => a.distance - b.distance || a.order - b.order)
    .map((entry) => entry.direction);
}
