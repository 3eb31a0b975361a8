/**
 * Shortcut carving across thin walls between two parts of the path.
 */

import { addPoints } from "../core/geometry/operations";
import {
  type Point,
  SHIFT_DIRECTIONS,
  SHIFT_VECTORS,
  type ShiftDirection,
} from "../core/geometry/types";
import { packCoord } from "../core/grid/flood-fill";
import { CellType, type MutableGrid, type ReadonlyGrid } from "../core/grid/types";
import { createKernel } from "../core/kernel/kernel";
import { stampKernel } from "../core/kernel/stamp";
import type { LevelState, Pass, Skip } from "../pipeline/types";
import { SkipTracker } from "../skips/skip-tracker";

const PASS_ID = "post.generate-skips";

const SKIP_INNER_KERNEL = createKernel(1, 0);
const SKIP_OUTER_KERNEL = createKernel(2, 0);

/**
 * Last path index of every path cell.
 */
export function indexPath(path: readonly Point[]): Map<number, number> {
  const index = new Map<number, number>();
  path.forEach((p, i) => index.set(packCoord(p.x, p.y), i));
  return index;
}

/**
 * Cast a ray from `path[fromIndex]`. It must leave the tunnel, cross solid
 * cells, and come back into open space on a later path cell, all within
 * `maxLength` cells. A second wall ends the ray.
 */
export function castSkipRay(
  grid: ReadonlyGrid,
  path: readonly Point[],
  pathIndex: ReadonlyMap<number, number>,
  fromIndex: number,
  direction: ShiftDirection,
  maxLength: number,
): Skip | null {
  const start = path[fromIndex];
  if (!start) return null;

  const step = SHIFT_VECTORS[direction];
  let phase: "inside" | "wall" | "beyond" = "inside";

  for (let length = 1; length <= maxLength; length++) {
    const x = start.x + step.x * length;
    const y = start.y + step.y * length;
    if (!grid.isInBounds(x, y)) return null;

    const open = grid.getUnsafe(x, y) === CellType.EMPTY;
    if (!open) {
      if (phase === "beyond") return null;
      phase = "wall";
      continue;
    }
    if (phase === "inside") continue;

    phase = "beyond";
    const toIndex = pathIndex.get(packCoord(x, y));
    if (toIndex !== undefined && toIndex > fromIndex) {
      return {
        start,
        end: { x, y },
        direction,
        length,
        fromIndex,
        toIndex,
      };
    }
  }
  return null;
}

/**
 * Carve an accepted skip: radius-1 open core, radius-2 freeze lining.
 */
export function carveSkip(grid: MutableGrid, skip: Skip): void {
  const step = SHIFT_VECTORS[skip.direction];
  let cursor = skip.start;
  for (let i = 0; i <= skip.length; i++) {
    stampKernel(grid, cursor, SKIP_OUTER_KERNEL, CellType.FREEZE, "buffer");
    stampKernel(grid, cursor, SKIP_INNER_KERNEL, CellType.EMPTY, "carve");
    cursor = addPoints(cursor, step);
  }
}

export function generateSkips(): Pass<LevelState, LevelState> {
  return {
    id: PASS_ID,
    run(input, ctx) {
      const { grid, path } = input;
      const tracker = new SkipTracker(ctx.profile, path.length);
      const pathIndex = indexPath(path);
      const maxLength = ctx.profile.skipLengthBounds[1];
      let rejected = 0;

      for (let i = 0; i < path.length && !tracker.isExhausted; i++) {
        for (const direction of SHIFT_DIRECTIONS) {
          const candidate = castSkipRay(
            grid,
            path,
            pathIndex,
            i,
            direction,
            maxLength,
          );
          if (!candidate) continue;

          const result = tracker.tryAccept(candidate);
          if (result.isErr()) {
            rejected++;
            continue;
          }
          carveSkip(grid, candidate);
          ctx.trace.decision(
            PASS_ID,
            "Skip accepted",
            [candidate.fromIndex, candidate.toIndex],
            candidate,
            `Saves ${candidate.toIndex - candidate.fromIndex - candidate.length} path cells`,
          );
        }
      }

      ctx.trace.decision(
        PASS_ID,
        "Skips generated",
        [`budget ${tracker.budget.toFixed(1)}`],
        tracker.skips.length,
        `${tracker.skips.length} accepted, ${rejected} rejected, ${tracker.skippedPath} path cells skipped`,
      );

      return { ...input, skips: [...input.skips, ...tracker.skips] };
    },
  };
}
