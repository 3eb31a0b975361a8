/**
 * Pipeline types: the level state carried through post-processing, the
 * final artifact, passes and tracing.
 */

import type { GenerationProfile } from "@tunnelgen/contracts";
import type { Bounds, Point, ShiftDirection } from "../core/geometry/types";
import type { Grid } from "../core/grid/grid";
import type { WeightedSampler } from "../core/random/weighted-sampler";

// =============================================================================
// LEVEL DATA
// =============================================================================

export type TerminalKind = "start" | "finish";

/**
 * Room carved at the spawn or at the walker's final position.
 * `bounds` covers the room and its start/finish border.
 */
export interface TerminalRoom {
  readonly kind: TerminalKind;
  readonly center: Point;
  readonly margin: number;
  readonly bounds: Bounds;
}

/**
 * Hookable platform placed inside a tunnel, top-left anchored.
 */
export interface Platform {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Straight shortcut from path index `fromIndex` to the later `toIndex`.
 * `length` counts the cells of the ray, the end cell included.
 */
export interface Skip {
  readonly start: Point;
  readonly end: Point;
  readonly direction: ShiftDirection;
  readonly length: number;
  readonly fromIndex: number;
  readonly toIndex: number;
}

/**
 * State handed from pass to pass. Passes mutate `grid` in place and return
 * a copy with their own additions.
 */
export interface LevelState {
  readonly grid: Grid;
  /** Every walker position, spawn first */
  readonly path: readonly Point[];
  readonly finish: Point;
  readonly finished: boolean;
  readonly steps: number;
  readonly skips: readonly Skip[];
  readonly platforms: readonly Platform[];
  readonly rooms: readonly TerminalRoom[];
}

/**
 * Finished level as returned to callers.
 */
export interface LevelArtifact {
  readonly grid: Grid;
  readonly spawn: Point;
  readonly finish: Point;
  readonly rooms: readonly TerminalRoom[];
  readonly platforms: readonly Platform[];
  readonly skips: readonly Skip[];
  readonly pathLength: number;
  readonly steps: number;
  readonly finished: boolean;
  /** Versioned FNV-64 of the grid, see `calculateLevelChecksum` */
  readonly checksum: string;
}

// =============================================================================
// VALIDATION
// =============================================================================

export type ViolationSeverity = "error" | "warning";

export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: ViolationSeverity;
}

// =============================================================================
// PASSES
// =============================================================================

export interface PassContext {
  readonly profile: GenerationProfile;
  readonly sampler: WeightedSampler;
  readonly trace: TraceCollector;
}

/**
 * A post-processing step over the level state.
 */
export interface Pass<TIn = LevelState, TOut = LevelState> {
  readonly id: string;
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// TRACE
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Decision event for "explain why" debugging
 */
export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly unknown[];
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}
