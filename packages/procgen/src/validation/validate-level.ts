import type { GenerationProfile } from "@tunnelgen/contracts";
import { boundsOverlap, squaredDistance } from "../core/geometry/operations";
import type { Bounds, Point } from "../core/geometry/types";
import { areConnected } from "../core/grid/flood-fill";
import { CellType, isWalkable, type ReadonlyGrid } from "../core/grid/types";
import { calculateLevelChecksum } from "../core/hash/checksum";
import type { LevelArtifact, Platform, Violation } from "../pipeline/types";
import {
  type LevelValidationResult,
  toValidationResult,
} from "./result-types";

function containsBounds(area: Bounds, x: number, y: number): boolean {
  return x >= area.minX && x <= area.maxX && y >= area.minY && y <= area.maxY;
}

function platformHalo(platform: Platform): Bounds {
  return {
    minX: platform.x - 1,
    minY: platform.y - 1,
    maxX: platform.x + platform.width,
    maxY: platform.y + platform.height,
  };
}

function standingCell(p: Point): Point {
  return p.y > 0 ? { x: p.x, y: p.y - 1 } : p;
}

/**
 * Cells the player starts from and has to reach: the row above the spawn
 * and above the finish position, or the position itself on the top row.
 */
export function levelEndpoints(artifact: LevelArtifact): {
  from: Point;
  to: Point;
} {
  return {
    from: standingCell(artifact.spawn),
    to: standingCell(artifact.finish),
  };
}

export function checkConnectivity(artifact: LevelArtifact): Violation[] {
  const { grid } = artifact;
  const { from, to } = levelEndpoints(artifact);

  for (const [label, point] of [
    ["Spawn", from],
    ["Finish", to],
  ] as const) {
    if (!grid.containsPoint(point) || !isWalkable(grid.getUnsafe(point.x, point.y))) {
      return [
        {
          type: "invariant.connectivity.endpoint",
          message: `${label} cell (${point.x}, ${point.y}) is not walkable`,
          severity: "error",
        },
      ];
    }
  }

  if (!areConnected(grid, from, to, isWalkable)) {
    return [
      {
        type: "invariant.connectivity",
        message: `Finish (${to.x}, ${to.y}) is not reachable from spawn (${from.x}, ${from.y})`,
        severity: "error",
      },
    ];
  }
  return [];
}

/**
 * Empty cells touching hookable terrain (8-neighbourhood), outside terminal
 * rooms and platform surroundings.
 */
export function findBufferGaps(
  grid: ReadonlyGrid,
  exempt: readonly Bounds[],
): Point[] {
  const gaps: Point[] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.getUnsafe(x, y) !== CellType.EMPTY) continue;
      if (exempt.some((area) => containsBounds(area, x, y))) continue;

      let touches = false;
      grid.forEachNeighbor8(x, y, (_nx, _ny, cell) => {
        if (cell === CellType.HOOKABLE) touches = true;
      });
      if (touches) gaps.push({ x, y });
    }
  }

  return gaps;
}

export function checkBufferInvariant(artifact: LevelArtifact): Violation[] {
  const exempt = [
    ...artifact.rooms.map((room) => room.bounds),
    ...artifact.platforms.map(platformHalo),
  ];
  const gaps = findBufferGaps(artifact.grid, exempt);
  const first = gaps[0];
  if (!first) return [];

  return [
    {
      type: "invariant.buffer",
      message: `${gaps.length} empty cells touch hookable terrain, first at (${first.x}, ${first.y})`,
      severity: "error",
    },
  ];
}

export function checkBounds(artifact: LevelArtifact): Violation[] {
  const { grid } = artifact;
  const violations: Violation[] = [];
  const outside = (what: string, point: Point): void => {
    violations.push({
      type: "invariant.bounds",
      message: `${what} (${point.x}, ${point.y}) lies outside the ${grid.width}x${grid.height} grid`,
      severity: "error",
    });
  };

  if (!grid.containsPoint(artifact.spawn)) outside("Spawn", artifact.spawn);
  if (!grid.containsPoint(artifact.finish)) outside("Finish", artifact.finish);
  for (const platform of artifact.platforms) {
    const corner = {
      x: platform.x + platform.width - 1,
      y: platform.y + platform.height - 1,
    };
    if (!grid.containsPoint(platform)) outside("Platform", platform);
    else if (!grid.containsPoint(corner)) outside("Platform corner", corner);
  }
  for (const skip of artifact.skips) {
    if (!grid.containsPoint(skip.start)) outside("Skip start", skip.start);
    if (!grid.containsPoint(skip.end)) outside("Skip end", skip.end);
  }

  return violations;
}

/**
 * Structural checks on accepted skips, plus length, spacing and budget
 * limits when the profile the level was generated with is given.
 */
export function checkSkipSafety(
  artifact: LevelArtifact,
  profile?: GenerationProfile,
): Violation[] {
  const violations: Violation[] = [];
  const fail = (message: string): void => {
    violations.push({ type: "invariant.skip", message, severity: "error" });
  };

  let skipped = 0;
  artifact.skips.forEach((skip, index) => {
    if (skip.fromIndex >= skip.toIndex || skip.toIndex >= artifact.pathLength) {
      fail(`Skip ${index} joins path indices ${skip.fromIndex} -> ${skip.toIndex}`);
    }
    skipped += skip.toIndex - skip.fromIndex;

    if (!profile) return;
    const [minLength, maxLength] = profile.skipLengthBounds;
    if (skip.length < minLength || skip.length > maxLength) {
      fail(`Skip ${index} has length ${skip.length} outside [${minLength}, ${maxLength}]`);
    }
    for (let other = 0; other < index; other++) {
      const previous = artifact.skips[other];
      if (
        previous &&
        squaredDistance(previous.start, skip.start) < profile.skipMinSpacingSqr
      ) {
        fail(`Skips ${other} and ${index} start too close together`);
      }
    }
  });

  if (profile) {
    const budget = profile.maxLevelSkipFraction * artifact.pathLength;
    if (skipped > budget) {
      fail(`Skips bypass ${skipped} path positions, budget is ${budget}`);
    }
  }

  return violations;
}

const TERMINAL_MARKERS = [
  ["SPAWN", CellType.SPAWN],
  ["START", CellType.START],
  ["FINISH", CellType.FINISH],
] as const;

/**
 * Start and finish rooms stay apart and every terminal marker is present.
 */
export function checkTerminals(artifact: LevelArtifact): Violation[] {
  const violations: Violation[] = [];
  const fail = (message: string): void => {
    violations.push({ type: "invariant.terminals", message, severity: "error" });
  };

  const start = artifact.rooms.find((room) => room.kind === "start");
  const finish = artifact.rooms.find((room) => room.kind === "finish");
  if (start && finish && boundsOverlap(start.bounds, finish.bounds)) {
    fail("Start and finish rooms overlap");
  }
  for (const [label, cell] of TERMINAL_MARKERS) {
    if (artifact.grid.countCells(cell) === 0) fail(`Level has no ${label} cells`);
  }

  return violations;
}

export function checkChecksum(artifact: LevelArtifact): Violation[] {
  const actual = calculateLevelChecksum(artifact.grid);
  if (actual === artifact.checksum) return [];
  return [
    {
      type: "invariant.checksum",
      message: `Checksum mismatch: expected ${artifact.checksum}, got ${actual}`,
      severity: "error",
    },
  ];
}

/**
 * Validate a generated level.
 *
 * Checks:
 * - Finish is reachable from the spawn line through walkable cells
 * - No empty cell touches hookable terrain outside rooms and platforms
 * - Spawn, finish, platforms and skips lie inside the grid
 * - Skips are well-formed and, given the profile, within its limits
 * - Start and finish rooms are apart and their markers present
 * - Checksum matches the grid
 * - The walker reached its last waypoint (warning only)
 */
export function validateLevel(
  artifact: LevelArtifact,
  profile?: GenerationProfile,
): LevelValidationResult {
  const violations: Violation[] = [
    ...checkBounds(artifact),
    ...checkConnectivity(artifact),
    ...checkBufferInvariant(artifact),
    ...checkSkipSafety(artifact, profile),
    ...checkTerminals(artifact),
    ...checkChecksum(artifact),
  ];

  if (!artifact.finished) {
    violations.push({
      type: "level.unfinished",
      message: `Walker stopped after ${artifact.steps} steps before its last waypoint`,
      severity: "warning",
    });
  }

  return toValidationResult(violations);
}
