/**
 * Bookkeeping for shortcuts across walls between two parts of the path.
 */

import {
  Err,
  GenerationError,
  type GenerationProfile,
  Ok,
  type Result,
} from "@tunnelgen/contracts";
import { squaredDistance } from "../core/geometry/operations";
import type { Skip } from "../pipeline/types";

export type SkipRejectionReason =
  | "exhausted"
  | "length"
  | "no-saving"
  | "spacing"
  | "budget";

/**
 * Accepts or rejects skip candidates for one run.
 *
 * A candidate is rejected when its length is outside `skipLengthBounds`,
 * when it does not save path, when its start is closer than
 * `skipMinSpacingSqr` to an accepted skip's start, or when the path it skips
 * would push the total over `maxLevelSkipFraction` of the path length. Once
 * that budget has been overrun no further skip is accepted.
 */
export class SkipTracker {
  private readonly accepted: Skip[] = [];
  private skipped = 0;
  private exhausted = false;

  constructor(
    private readonly profile: GenerationProfile,
    private readonly pathLength: number,
  ) {}

  get skips(): readonly Skip[] {
    return this.accepted;
  }

  /** Path positions bypassed by accepted skips */
  get skippedPath(): number {
    return this.skipped;
  }

  get budget(): number {
    return this.profile.maxLevelSkipFraction * this.pathLength;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  /**
   * Check a candidate against every constraint without recording it.
   */
  validate(candidate: Skip): Result<Skip, GenerationError> {
    const [minLength, maxLength] = this.profile.skipLengthBounds;
    const saved = candidate.toIndex - candidate.fromIndex;

    if (this.exhausted) {
      return reject("exhausted", "Skip budget exhausted for this level", candidate, {
        budget: this.budget,
      });
    }
    if (candidate.length < minLength || candidate.length > maxLength) {
      return reject(
        "length",
        `Skip length ${candidate.length} outside [${minLength}, ${maxLength}]`,
        candidate,
        { minLength, maxLength },
      );
    }
    if (saved <= candidate.length) {
      return reject("no-saving", "Skip does not save path", candidate, { saved });
    }
    for (const other of this.accepted) {
      const distance = squaredDistance(candidate.start, other.start);
      if (distance < this.profile.skipMinSpacingSqr) {
        return reject("spacing", "Skip too close to an accepted skip", candidate, {
          distanceSqr: distance,
          minSpacingSqr: this.profile.skipMinSpacingSqr,
        });
      }
    }
    if (this.skipped + saved > this.budget) {
      return reject("budget", "Skip would exceed the level skip budget", candidate, {
        skipped: this.skipped,
        saved,
        budget: this.budget,
      });
    }
    return Ok(candidate);
  }

  /**
   * Validate and record. A candidate that overruns the budget closes the
   * tracker for the rest of the run.
   */
  tryAccept(candidate: Skip): Result<Skip, GenerationError> {
    const result = this.validate(candidate);
    if (result.isOk()) {
      this.accepted.push(candidate);
      this.skipped += candidate.toIndex - candidate.fromIndex;
    } else if (result.error.details?.reason === "budget") {
      this.exhausted = true;
    }
    return result;
  }
}

function reject(
  reason: SkipRejectionReason,
  message: string,
  candidate: Skip,
  details: Record<string, unknown>,
): Result<Skip, GenerationError> {
  return Err(
    GenerationError.skipRejected(message, {
      reason,
      from: candidate.fromIndex,
      to: candidate.toIndex,
      length: candidate.length,
      ...details,
    }),
  );
}
