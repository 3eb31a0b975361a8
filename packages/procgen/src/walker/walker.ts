/**
 * Random walk agent carving tunnels between waypoints.
 */

import {
  GenerationError,
  type GenerationProfile,
} from "@tunnelgen/contracts";
import { shiftPoint, squaredDistance } from "../core/geometry/operations";
import type { Dimensions, Point, ShiftDirection } from "../core/geometry/types";
import { BitGrid } from "../core/grid/bit-grid";
import { CellType, type MutableGrid } from "../core/grid/types";
import {
  type Kernel,
  kernelFromSize,
  withMinRadius,
} from "../core/kernel/kernel";
import { type StampOptions, stampKernel, stampMask } from "../core/kernel/stamp";
import type { WeightedSampler } from "../core/random/weighted-sampler";
import { NoOpTraceCollector } from "../pipeline/trace";
import type { TraceCollector } from "../pipeline/types";
import { fadeInnerSize, pulseDelay } from "./kernel-schedule";
import { rankShifts } from "./shifts";

const TRACE_ID = "walker";

export type WalkerStatus = "walking" | "finished";

export interface WalkerInit {
  readonly start: Point;
  /** Visit order; subwaypoints already inserted */
  readonly waypoints: readonly Point[];
  readonly dimensions: Dimensions;
  readonly innerSize: number;
  readonly innerCircularity: number;
  readonly outerMargin: number;
  readonly outerCircularity: number;
}

/**
 * Kernel shapes are kept as sizes and circularities; the kernels themselves
 * are derived, so a mutation always swaps in a whole new value.
 */
interface KernelShape {
  innerSize: number;
  innerCircularity: number;
  outerMargin: number;
  outerCircularity: number;
}

export class Walker {
  private pos: Point;
  private readonly waypoints: readonly Point[];
  private cursor = 0;
  private status: WalkerStatus = "walking";
  private readonly shape: KernelShape;
  private previousShift: ShiftDirection | null = null;
  private lastShift: ShiftDirection | null = null;
  private stepCount = 0;
  private pulseCounter = 0;
  private readonly history: Point[];
  private lockCursor = 0;
  private readonly locks: BitGrid;
  private readonly stampOptions: StampOptions;

  constructor(
    init: WalkerInit,
    private readonly profile: GenerationProfile,
    private readonly sampler: WeightedSampler,
    private readonly trace: TraceCollector = new NoOpTraceCollector(),
  ) {
    if (init.waypoints.length === 0) {
      throw GenerationError.configInvalid("Walker needs at least one waypoint", {
        parameter: "waypoints",
      });
    }
    this.pos = init.start;
    this.waypoints = init.waypoints;
    this.history = [init.start];
    this.locks = new BitGrid(init.dimensions.width, init.dimensions.height);
    this.shape = {
      innerSize: init.innerSize,
      innerCircularity: init.innerCircularity,
      outerMargin: init.outerMargin,
      outerCircularity: init.outerCircularity,
    };
    this.stampOptions = {
      locked: this.locks,
      edgeFuzz: {
        probability: profile.kernelEdgeFuzzProb,
        chance: (p) => sampler.withProbability(p),
      },
    };
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  get position(): Point {
    return this.pos;
  }

  get finished(): boolean {
    return this.status === "finished";
  }

  get steps(): number {
    return this.stepCount;
  }

  get waypointIndex(): number {
    return this.cursor;
  }

  get currentGoal(): Point | undefined {
    return this.waypoints[this.cursor];
  }

  /**
   * Every position the walker occupied, starting position first.
   */
  get path(): readonly Point[] {
    return this.history;
  }

  get lastDirection(): ShiftDirection | null {
    return this.lastShift;
  }

  get innerKernel(): Kernel {
    return kernelFromSize(this.shape.innerSize, this.shape.innerCircularity);
  }

  get outerKernel(): Kernel {
    return withMinRadius(
      kernelFromSize(
        this.shape.innerSize + this.shape.outerMargin,
        this.shape.outerCircularity,
      ),
      1,
    );
  }

  isLocked(x: number, y: number): boolean {
    return this.locks.get(x, y);
  }

  // ===========================================================================
  // STEP
  // ===========================================================================

  /**
   * One tick: goal check, kernel update, shift, carve, lock bookkeeping.
   * No-op once finished.
   *
   * @throws GenerationError `OUT_OF_BOUNDS` when the shift leaves the grid,
   * `WALKER_STUCK` when no shift is possible or locking lags too far behind
   */
  step(grid: MutableGrid): void {
    if (this.finished) return;

    this.checkGoal();
    if (this.finished) return;

    this.updateKernels();
    const direction = this.chooseShift();
    this.move(direction, grid);
    this.carve(grid);
    this.stepCount++;
    this.updateLocks();
  }

  private checkGoal(): void {
    const goal = this.currentGoal;
    if (!goal) {
      this.status = "finished";
      return;
    }
    if (squaredDistance(this.pos, goal) > this.profile.waypointReachedDistSqr) {
      return;
    }

    this.cursor++;
    const done = this.cursor >= this.waypoints.length;
    if (done) this.status = "finished";

    this.trace.decision(
      TRACE_ID,
      "Waypoint reached",
      [goal],
      done ? "finished" : this.currentGoal,
      `Step ${this.stepCount}: (${this.pos.x}, ${this.pos.y}) within reach of (${goal.x}, ${goal.y})`,
    );
  }

  private updateKernels(): void {
    const fadeSize = fadeInnerSize(this.stepCount, this.profile);
    if (fadeSize !== null) {
      this.shape.innerSize = Math.max(1, fadeSize);
      this.shape.innerCircularity = 0;
      this.shape.outerMargin = 2;
      this.shape.outerCircularity = 0;
      return;
    }

    const { profile, sampler, shape } = this;
    const mutated: string[] = [];
    if (sampler.withProbability(profile.innerSizeMutProb)) {
      shape.innerSize = sampler.sampleInnerSize();
      mutated.push(`innerSize=${shape.innerSize}`);
    }
    if (sampler.withProbability(profile.innerRadMutProb)) {
      shape.innerCircularity = sampler.sampleCircularity();
      mutated.push(`innerCircularity=${shape.innerCircularity}`);
    }
    if (sampler.withProbability(profile.outerSizeMutProb)) {
      shape.outerMargin = sampler.sampleOuterMargin();
      mutated.push(`outerMargin=${shape.outerMargin}`);
    }
    if (sampler.withProbability(profile.outerRadMutProb)) {
      shape.outerCircularity = sampler.sampleCircularity();
      mutated.push(`outerCircularity=${shape.outerCircularity}`);
    }

    if (mutated.length > 0 && this.trace.enabled) {
      this.trace.decision(
        TRACE_ID,
        "Kernel mutated",
        mutated,
        { ...shape },
        `Step ${this.stepCount}`,
      );
    }
  }

  /**
   * A target is blocked when any cell of its 3x3 neighbourhood is locked,
   * which keeps every path cell's full buffer stampable.
   */
  private isBlocked(target: Point): boolean {
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (this.locks.get(target.x + dx, target.y + dy)) return true;
      }
    }
    return false;
  }

  private chooseShift(): ShiftDirection {
    const goal = this.currentGoal;
    if (!goal) {
      throw GenerationError.walkerStuck("Walker has no goal left", {
        step: this.stepCount,
      });
    }

    const ranked = rankShifts(this.pos, goal).filter(
      (direction) => !this.isBlocked(shiftPoint(this.pos, direction)),
    );
    if (ranked.length === 0) {
      throw GenerationError.walkerStuck(
        `No shift available at (${this.pos.x}, ${this.pos.y})`,
        { step: this.stepCount, x: this.pos.x, y: this.pos.y },
      );
    }

    const drawn = this.sampler.sampleShift(ranked);
    const last = this.lastShift;
    if (
      last !== null &&
      this.sampler.withProbability(this.profile.momentumProb) &&
      ranked.includes(last)
    ) {
      return last;
    }
    return drawn;
  }

  private move(direction: ShiftDirection, grid: MutableGrid): void {
    const next = shiftPoint(this.pos, direction);
    if (!grid.containsPoint(next)) {
      throw GenerationError.outOfBounds(
        `Walker left the grid moving ${direction} from (${this.pos.x}, ${this.pos.y})`,
        { step: this.stepCount, x: next.x, y: next.y, direction },
      );
    }
    this.pos = next;
    this.previousShift = this.lastShift;
    this.lastShift = direction;
  }

  private carve(grid: MutableGrid): void {
    let inner = this.innerKernel;
    let outer = this.outerKernel;

    if (this.profile.enablePulse) {
      this.pulseCounter++;
      const delay = pulseDelay(this.previousShift, this.lastShift, this.profile);
      if (this.pulseCounter > delay) {
        const size = this.profile.pulseMaxKernelSize;
        inner = kernelFromSize(size, this.shape.innerCircularity);
        outer = withMinRadius(
          kernelFromSize(size + 2, this.shape.outerCircularity),
          1,
        );
        this.pulseCounter = 0;
      }
    }

    stampKernel(grid, this.pos, outer, CellType.FREEZE, "buffer", this.stampOptions);
    stampKernel(grid, this.pos, inner, CellType.EMPTY, "carve", this.stampOptions);
  }

  /**
   * Lock history positions the walker has moved away from. A lock cursor
   * lagging more than `posLockMaxDelay` positions means the walker keeps
   * circling the same area.
   */
  private updateLocks(): void {
    this.history.push(this.pos);

    const maxDistSqr = this.profile.posLockMaxDist * this.profile.posLockMaxDist;
    const lockKernel = kernelFromSize(this.profile.lockKernelSize, 0);
    while (this.lockCursor < this.history.length) {
      const old = this.history[this.lockCursor];
      if (!old || squaredDistance(old, this.pos) <= maxDistSqr) break;
      stampMask(this.locks, old, lockKernel);
      this.lockCursor++;
    }

    const delay = this.history.length - this.lockCursor;
    if (delay > this.profile.posLockMaxDelay) {
      throw GenerationError.walkerStuck(
        `Position lock lagged ${delay} steps behind`,
        {
          step: this.stepCount,
          delay,
          maxDelay: this.profile.posLockMaxDelay,
        },
      );
    }
  }
}
