/**
 * Post-processing pipeline run once after the walk.
 */

import { carveRoomsPass } from "../passes/carve-rooms";
import { fixEdgeBugsPass } from "../passes/fix-edge-bugs";
import { generateSkips } from "../passes/generate-skips";
import { placePlatforms } from "../passes/place-platforms";
import { removeFreezeBlobsPass } from "../passes/remove-freeze-blobs";
import type { LevelState, Pass, PassContext } from "./types";

/**
 * Passes in execution order. Skips are carved before edge repair so their
 * linings get fixed too; rooms come last so nothing overwrites their markers.
 */
export function createPostProcessPasses(): Pass<LevelState, LevelState>[] {
  return [
    generateSkips(),
    fixEdgeBugsPass(),
    removeFreezeBlobsPass(),
    placePlatforms(),
    carveRoomsPass(),
  ];
}

export function runPasses(
  input: LevelState,
  passes: readonly Pass<LevelState, LevelState>[],
  ctx: PassContext,
): LevelState {
  let current = input;

  for (const pass of passes) {
    ctx.trace.start(pass.id);
    const passStart = performance.now();

    current = pass.run(current, ctx);

    ctx.trace.end(pass.id, performance.now() - passStart);
  }

  return current;
}
