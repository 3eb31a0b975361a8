import { findRegions, forEachRegionPoint } from "../core/grid/flood-fill";
import { CellType, type MutableGrid } from "../core/grid/types";
import type { LevelState, Pass } from "../pipeline/types";

const PASS_ID = "post.remove-freeze-blobs";

/**
 * Open up freeze regions (8-connected) smaller than `minSize` that float in
 * open space, i.e. do not touch hookable terrain.
 *
 * @returns Number of blobs removed
 */
export function removeFreezeBlobs(grid: MutableGrid, minSize: number): number {
  if (minSize <= 0) return 0;

  const regions = findRegions(grid, (cell) => cell === CellType.FREEZE, {
    diagonal: true,
  });
  let removed = 0;

  for (const region of regions) {
    if (region.size >= minSize) continue;

    let anchored = false;
    forEachRegionPoint(region, (x, y) => {
      if (anchored) return;
      grid.forEachNeighbor8(x, y, (_nx, _ny, cell) => {
        if (cell === CellType.HOOKABLE) anchored = true;
      });
    });
    if (anchored) continue;

    forEachRegionPoint(region, (x, y) => grid.setUnsafe(x, y, CellType.EMPTY));
    removed++;
  }

  return removed;
}

export function removeFreezeBlobsPass(): Pass<LevelState, LevelState> {
  return {
    id: PASS_ID,
    run(input, ctx) {
      const removed = removeFreezeBlobs(input.grid, ctx.profile.minFreezeSize);
      if (removed > 0) {
        ctx.trace.decision(
          PASS_ID,
          "Freeze blobs removed",
          [`minFreezeSize ${ctx.profile.minFreezeSize}`],
          removed,
          `${removed} floating freeze regions opened up`,
        );
      }
      return input;
    },
  };
}
