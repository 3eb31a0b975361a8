/**
 * Shared fixtures for pass and generator tests.
 */

import {
  buildGenerationProfile,
  type GenerationProfile,
  type GenerationProfileInput,
} from "@tunnelgen/contracts";
import type { Point } from "../src/core/geometry";
import { CellType, Grid } from "../src/core/grid";
import { WeightedSampler } from "../src/core/random";
import { NoOpTraceCollector } from "../src/pipeline/trace";
import type { LevelState, PassContext } from "../src/pipeline/types";

export function profileWith(
  overrides: Partial<GenerationProfileInput> = {},
): GenerationProfile {
  return buildGenerationProfile(overrides).getOrThrow();
}

export function createContext(profile: GenerationProfile, seed = 1): PassContext {
  return {
    profile,
    sampler: new WeightedSampler(seed, profile),
    trace: new NoOpTraceCollector(),
  };
}

/**
 * Straight run of cells from `from` to `to` (same row or column), ends
 * included.
 */
export function line(from: Point, to: Point): Point[] {
  const points: Point[] = [];
  const dx = Math.sign(to.x - from.x);
  const dy = Math.sign(to.y - from.y);
  let current = from;
  points.push(current);
  while (current.x !== to.x || current.y !== to.y) {
    current = { x: current.x + dx, y: current.y + dy };
    points.push(current);
  }
  return points;
}

/**
 * Open every path cell of a hookable grid.
 */
export function carvePath(grid: Grid, path: readonly Point[]): void {
  for (const p of path) grid.set(p.x, p.y, CellType.EMPTY);
}

export function levelState(
  grid: Grid,
  path: readonly Point[],
  overrides: Partial<LevelState> = {},
): LevelState {
  const last = path[path.length - 1] ?? grid.spawn;
  return {
    grid,
    path,
    finish: last,
    finished: true,
    steps: Math.max(0, path.length - 1),
    skips: [],
    platforms: [],
    rooms: [],
    ...overrides,
  };
}
