import { CellType, type MutableGrid } from "../core/grid/types";
import type { LevelState, Pass } from "../pipeline/types";

const PASS_ID = "post.fix-edge-bugs";

/**
 * Freeze every open cell that touches hookable terrain (8-neighbourhood).
 * Writing freeze never creates new hookable cells, so one in-place sweep
 * is enough.
 *
 * @returns Number of cells converted
 */
export function fixEdgeBugs(grid: MutableGrid): number {
  let fixed = 0;
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.getUnsafe(x, y) !== CellType.EMPTY) continue;

      let touchesHookable = false;
      grid.forEachNeighbor8(x, y, (_nx, _ny, cell) => {
        if (cell === CellType.HOOKABLE) touchesHookable = true;
      });
      if (touchesHookable) {
        grid.setUnsafe(x, y, CellType.FREEZE);
        fixed++;
      }
    }
  }
  return fixed;
}

export function fixEdgeBugsPass(): Pass<LevelState, LevelState> {
  return {
    id: PASS_ID,
    run(input, ctx) {
      const fixed = fixEdgeBugs(input.grid);
      ctx.trace.decision(
        PASS_ID,
        "Edge bugs repaired",
        [],
        fixed,
        `${fixed} open cells next to hookable terrain frozen`,
      );
      return input;
    },
  };
}
