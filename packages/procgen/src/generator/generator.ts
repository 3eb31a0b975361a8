/**
 * Generator: owns the grid, the walker and the sampler of one run.
 */

import {
  GenerationError,
  type GenerationProfile,
  type GenerationProfileInput,
  type MapSkeleton,
  parseGenerationProfile,
  parseMapSkeleton,
} from "@tunnelgen/contracts";
import type { Point } from "../core/geometry/types";
import { Grid } from "../core/grid/grid";
import { CellType } from "../core/grid/types";
import { calculateLevelChecksum } from "../core/hash/checksum";
import { WeightedSampler } from "../core/random/weighted-sampler";
import { assertRoomsApart } from "../passes/carve-rooms";
import { createPostProcessPasses, runPasses } from "../pipeline/post-process";
import { createTraceCollector } from "../pipeline/trace";
import type {
  LevelArtifact,
  LevelState,
  PassContext,
  TraceCollector,
} from "../pipeline/types";
import { insertSubwaypoints } from "../walker/subwaypoints";
import { Walker } from "../walker/walker";

export interface GeneratorOptions {
  /** Record trace events. Default: false */
  readonly trace?: boolean;
}

const INITIAL_OUTER_CIRCULARITY = 0.1;

export class Generator {
  private artifact: LevelArtifact | null = null;

  private constructor(
    readonly profile: GenerationProfile,
    readonly skeleton: MapSkeleton,
    readonly grid: Grid,
    readonly walker: Walker,
    private readonly sampler: WeightedSampler,
    readonly trace: TraceCollector,
  ) {}

  /**
   * Validate `profile` and `skeleton` and set up a run.
   *
   * @throws GenerationError `CONFIG_INVALID` when either fails validation
   */
  static create(
    profile: GenerationProfileInput,
    skeleton: MapSkeleton,
    seed: number | bigint,
    options: GeneratorOptions = {},
  ): Generator {
    const validProfile = parseGenerationProfile(profile).getOrThrow();
    const validSkeleton = parseMapSkeleton(skeleton).getOrThrow();

    const sampler = new WeightedSampler(seed, validProfile);
    const trace = createTraceCollector(options.trace ?? false);
    const dimensions = {
      width: validSkeleton.width,
      height: validSkeleton.height,
    };

    const firstWaypoint = validSkeleton.waypoints[0];
    const spawn: Point | undefined = validSkeleton.spawn ?? firstWaypoint;
    if (!spawn) {
      throw GenerationError.configInvalid("Map skeleton has no waypoints", {
        parameter: "waypoints",
      });
    }

    const grid = new Grid(
      dimensions.width,
      dimensions.height,
      CellType.HOOKABLE,
      { x: spawn.x, y: spawn.y },
    );
    const waypoints = insertSubwaypoints(
      validSkeleton.waypoints,
      validProfile,
      sampler,
      dimensions,
    );
    const walker = new Walker(
      {
        start: grid.spawn,
        waypoints,
        dimensions,
        innerSize: Math.max(...validProfile.innerSizeProbs.values),
        innerCircularity: 0,
        outerMargin: Math.max(...validProfile.outerMarginProbs.values),
        outerCircularity: INITIAL_OUTER_CIRCULARITY,
      },
      validProfile,
      sampler,
      trace,
    );

    return new Generator(
      validProfile,
      validSkeleton,
      grid,
      walker,
      sampler,
      trace,
    );
  }

  /**
   * Step `maxSteps` times (or until the walker finishes) and post-process.
   */
  static generate(
    maxSteps: number,
    seed: number | bigint,
    profile: GenerationProfileInput,
    skeleton: MapSkeleton,
    options: GeneratorOptions = {},
  ): LevelArtifact {
    return Generator.create(profile, skeleton, seed, options).run(maxSteps);
  }

  get finished(): boolean {
    return this.walker.finished;
  }

  get postProcessed(): boolean {
    return this.artifact !== null;
  }

  /**
   * One walker tick. No-op once the walker finished or the level was
   * post-processed.
   */
  step(): void {
    if (this.artifact) return;
    this.walker.step(this.grid);
  }

  /**
   * Step until the walker finishes or `maxSteps` ticks ran, then
   * post-process.
   */
  run(maxSteps: number): LevelArtifact {
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
      throw GenerationError.configInvalid(
        `maxSteps must be a non-negative integer, got ${maxSteps}`,
        { parameter: "maxSteps" },
      );
    }
    for (let i = 0; i < maxSteps && !this.finished; i++) {
      this.step();
    }
    return this.postProcess();
  }

  /**
   * Run the post-processing passes. Only the first call does work; later
   * calls return the same artifact.
   *
   * @throws GenerationError `CONFIG_INVALID` when the walk ended too close
   * to the spawn for separate start and finish rooms; the grid is left
   * untouched.
   */
  postProcess(): LevelArtifact {
    if (this.artifact) return this.artifact;

    assertRoomsApart(
      this.grid.spawn,
      this.walker.position,
      this.profile.roomMargin,
      this.walker.finished,
    );

    const ctx: PassContext = {
      profile: this.profile,
      sampler: this.sampler,
      trace: this.trace,
    };
    const initial: LevelState = {
      grid: this.grid,
      path: this.walker.path,
      finish: this.walker.position,
      finished: this.walker.finished,
      steps: this.walker.steps,
      skips: [],
      platforms: [],
      rooms: [],
    };

    const state = runPasses(initial, createPostProcessPasses(), ctx);

    this.artifact = {
      grid: state.grid,
      spawn: state.grid.spawn,
      finish: state.finish,
      rooms: state.rooms,
      platforms: state.platforms,
      skips: state.skips,
      pathLength: state.path.length,
      steps: state.steps,
      finished: state.finished,
      checksum: calculateLevelChecksum(state.grid),
    };
    return this.artifact;
  }
}
