/**
 * Hookable platforms floating inside wide tunnel sections.
 */

import type { GenerationProfile } from "@tunnelgen/contracts";
import { boundsOverlap } from "../core/geometry/operations";
import type { Bounds, Point } from "../core/geometry/types";
import { packCoord } from "../core/grid/flood-fill";
import { CellType, type ReadonlyGrid } from "../core/grid/types";
import type { LevelState, Pass, Platform } from "../pipeline/types";
import { terminalRoomBounds } from "./carve-rooms";

const PASS_ID = "post.place-platforms";

function isOpen(grid: ReadonlyGrid, x: number, y: number): boolean {
  return grid.isInBounds(x, y) && grid.getUnsafe(x, y) === CellType.EMPTY;
}

/**
 * Whether `platform` fits:
 *
 * - its cells are open and none of them is a path cell
 * - the ring around it is open; with `platSoftOverhang` the row right
 *   below may be freeze instead
 * - `platMinEmptyHeight` open rows sit above it
 * - it stays clear of `keepOut` areas
 */
export function canPlacePlatform(
  grid: ReadonlyGrid,
  platform: Platform,
  pathCells: ReadonlySet<number>,
  profile: GenerationProfile,
  keepOut: readonly Bounds[],
): boolean {
  const left = platform.x;
  const top = platform.y;
  const right = left + platform.width - 1;
  const bottom = top + platform.height - 1;

  const ring: Bounds = {
    minX: left - 1,
    minY: top - 1 - profile.platMinEmptyHeight,
    maxX: right + 1,
    maxY: bottom + 1,
  };
  if (keepOut.some((area) => boundsOverlap(area, ring))) return false;

  for (let y = top; y <= bottom; y++) {
    for (let x = left; x <= right; x++) {
      if (!isOpen(grid, x, y) || pathCells.has(packCoord(x, y))) return false;
    }
  }

  for (let x = left - 1; x <= right + 1; x++) {
    if (!isOpen(grid, x, top - 1)) return false;
    const below = bottom + 1;
    const soft =
      profile.platSoftOverhang &&
      grid.isInBounds(x, below) &&
      grid.getUnsafe(x, below) === CellType.FREEZE;
    if (!isOpen(grid, x, below) && !soft) return false;
  }
  for (let y = top; y <= bottom; y++) {
    if (!isOpen(grid, left - 1, y) || !isOpen(grid, right + 1, y)) return false;
  }

  for (let y = top - 1 - profile.platMinEmptyHeight; y < top - 1; y++) {
    for (let x = left; x <= right; x++) {
      if (!isOpen(grid, x, y)) return false;
    }
  }

  return true;
}

/**
 * Every `platMinDistance` path positions, try a platform of random size
 * hanging just below the walker's position there.
 */
export function placePlatforms(): Pass<LevelState, LevelState> {
  return {
    id: PASS_ID,
    run(input, ctx) {
      const { grid, path } = input;
      const { profile, sampler } = ctx;
      const pathCells = new Set(path.map((p) => packCoord(p.x, p.y)));
      const keepOut = [
        terminalRoomBounds(grid.spawn, profile.roomMargin),
        terminalRoomBounds(input.finish, profile.roomMargin),
      ];
      const placed: Platform[] = [];
      let attempts = 0;

      for (
        let i = profile.platMinDistance;
        i < path.length;
        i += profile.platMinDistance
      ) {
        const anchor: Point | undefined = path[i];
        if (!anchor) break;
        attempts++;

        const width = sampler.uniformInt(...profile.platWidthBounds);
        const height = sampler.uniformInt(...profile.platHeightBounds);
        const platform: Platform = {
          x: anchor.x - Math.floor((width - 1) / 2),
          y: anchor.y + 1,
          width,
          height,
        };
        if (!canPlacePlatform(grid, platform, pathCells, profile, keepOut)) {
          continue;
        }

        grid.setArea(
          { x: platform.x, y: platform.y },
          {
            x: platform.x + platform.width - 1,
            y: platform.y + platform.height - 1,
          },
          CellType.HOOKABLE,
          true,
        );
        placed.push(platform);
      }

      ctx.trace.decision(
        PASS_ID,
        "Platforms placed",
        [`every ${profile.platMinDistance} path cells`],
        placed.length,
        `${placed.length} of ${attempts} candidate positions had room for a platform`,
      );

      return { ...input, platforms: [...input.platforms, ...placed] };
    },
  };
}
