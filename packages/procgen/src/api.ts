/**
 * Generation API
 *
 * High-level API for level generation.
 */

import {
  buildGenerationProfile,
  DEFAULT_MAP_SKELETON,
  Err,
  GenerationError,
  type GenerationProfile,
  type GenerationProfileInput,
  type MapSkeleton,
  Ok,
  parseMapSkeleton,
  type Result,
} from "@tunnelgen/contracts";
import { Generator } from "./generator/generator";
import type { LevelArtifact, TraceEvent } from "./pipeline/types";

export interface GenerateLevelOptions {
  readonly seed: number | bigint;
  /** Upper bound on walker steps */
  readonly maxSteps: number;
  /** Overrides applied on top of the default profile */
  readonly profile?: Partial<GenerationProfileInput>;
  /** Default: the serpentine skeleton */
  readonly skeleton?: MapSkeleton;
  /** Record trace events. Default: false */
  readonly trace?: boolean;
}

export interface GenerateLevelOutput {
  readonly artifact: LevelArtifact;
  readonly profile: GenerationProfile;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Generate a level. Configuration errors and walker failures come back as
 * a failed result; anything else is rethrown.
 *
 * @example
 * ```typescript
 * const result = generateLevel({
 *   seed: 42,
 *   maxSteps: 5000,
 *   profile: { momentumProb: 0.05 },
 * });
 *
 * if (result.isOk()) {
 *   console.log(result.value.artifact.checksum);
 * }
 * ```
 */
export function generateLevel(
  options: GenerateLevelOptions,
): Result<GenerateLevelOutput, GenerationError> {
  return buildGenerationProfile(options.profile).flatMap((profile) =>
    parseMapSkeleton(options.skeleton ?? DEFAULT_MAP_SKELETON).flatMap(
      (skeleton) => runGeneration(profile, skeleton, options),
    ),
  );
}

function runGeneration(
  profile: GenerationProfile,
  skeleton: MapSkeleton,
  options: GenerateLevelOptions,
): Result<GenerateLevelOutput, GenerationError> {
  const start = performance.now();
  try {
    const generator = Generator.create(profile, skeleton, options.seed, {
      trace: options.trace,
    });
    const artifact = generator.run(options.maxSteps);
    return Ok({
      artifact,
      profile: generator.profile,
      trace: generator.trace.getEvents(),
      durationMs: performance.now() - start,
    });
  } catch (error) {
    if (GenerationError.isGenerationError(error)) return Err(error);
    throw error;
  }
}
