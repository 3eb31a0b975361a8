/**
 * Start and finish rooms.
 */

import { GenerationError } from "@tunnelgen/contracts";
import { boundsOverlap } from "../core/geometry/operations";
import type { Bounds, Point } from "../core/geometry/types";
import { CellType, type MutableGrid } from "../core/grid/types";
import type {
  LevelState,
  Pass,
  TerminalKind,
  TerminalRoom,
} from "../pipeline/types";

const PASS_ID = "post.carve-rooms";

/**
 * Area a terminal room claims: the open square plus its border ring.
 */
export function terminalRoomBounds(center: Point, margin: number): Bounds {
  return {
    minX: center.x - margin - 1,
    minY: center.y - margin - 1,
    maxX: center.x + margin + 1,
    maxY: center.y + margin + 1,
  };
}

/**
 * Carve a room around `center`:
 *
 * - open square of half-size `margin`
 * - hookable platform on the centre row, `margin - 2` cells to each side
 * - spawn line on the row above the platform (start room only)
 * - start or finish border one cell outside the square, written only over
 *   hookable cells so tunnels leaving the room stay open
 */
export function carveRoom(
  grid: MutableGrid,
  center: Point,
  margin: number,
  kind: TerminalKind,
): TerminalRoom {
  const { x, y } = center;
  const half = margin - 2;

  grid.setArea(
    { x: x - margin, y: y - margin },
    { x: x + margin, y: y + margin },
    CellType.EMPTY,
    true,
  );
  grid.setArea(
    { x: x - half, y },
    { x: x + half, y },
    CellType.HOOKABLE,
    true,
  );
  if (kind === "start") {
    grid.setArea(
      { x: x - half, y: y - 1 },
      { x: x + half, y: y - 1 },
      CellType.SPAWN,
      true,
    );
  }
  grid.setAreaBorder(
    { x: x - margin - 1, y: y - margin - 1 },
    { x: x + margin + 1, y: y + margin + 1 },
    kind === "start" ? CellType.START : CellType.FINISH,
    false,
  );

  return { kind, center, margin, bounds: terminalRoomBounds(center, margin) };
}

/**
 * Refuse a finish position whose room would overlap the start room: it
 * would erase the spawn line, and its border could not replace the start
 * border.
 *
 * @throws GenerationError `CONFIG_INVALID`
 */
export function assertRoomsApart(
  spawn: Point,
  finish: Point,
  margin: number,
  finished: boolean,
): void {
  if (
    !boundsOverlap(
      terminalRoomBounds(spawn, margin),
      terminalRoomBounds(finish, margin),
    )
  ) {
    return;
  }
  throw GenerationError.configInvalid(
    `Finish room at (${finish.x}, ${finish.y}) overlaps the start room at (${spawn.x}, ${spawn.y})`,
    {
      parameter: finished ? "skeleton" : "maxSteps",
      spawn,
      finish,
      margin,
    },
  );
}

export function carveRoomsPass(): Pass<LevelState, LevelState> {
  return {
    id: PASS_ID,
    run(input, ctx) {
      const margin = ctx.profile.roomMargin;
      assertRoomsApart(input.grid.spawn, input.finish, margin, input.finished);

      const start = carveRoom(input.grid, input.grid.spawn, margin, "start");
      const finish = carveRoom(input.grid, input.finish, margin, "finish");

      ctx.trace.decision(
        PASS_ID,
        "Terminal rooms",
        [start.center, finish.center],
        { margin },
        `Start room at (${start.center.x}, ${start.center.y}), finish room at (${finish.center.x}, ${finish.center.y})`,
      );
      if (!input.finished) {
        ctx.trace.warning(
          PASS_ID,
          "Walker did not reach its last waypoint; finish room placed at its final position",
        );
      }

      return { ...input, rooms: [...input.rooms, start, finish] };
    },
  };
}
