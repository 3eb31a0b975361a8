/**
 * Seeded sampling used at every probabilistic decision of a run.
 */

import {
  type Distribution,
  GenerationError,
  type GenerationProfile,
  SeededRandom,
  totalWeight,
} from "@tunnelgen/contracts";
import type { ShiftDirection } from "../geometry/types";

/**
 * One sampler per run. Identical seed, profile and call sequence reproduce
 * identical draws.
 */
export class WeightedSampler {
  private readonly rng: SeededRandom;

  constructor(
    seed: number | bigint,
    private readonly profile: GenerationProfile,
  ) {
    this.rng = new SeededRandom(seed);
  }

  /**
   * Pick a value with probability proportional to its weight.
   * Consumes exactly one draw.
   */
  sampleWeighted<T>(values: readonly T[], weights: readonly number[]): T {
    if (values.length !== weights.length) {
      throw GenerationError.configInvalid(
        `Weighted sample has ${values.length} values but ${weights.length} weights`,
        { parameter: "weights", values: values.length, weights: weights.length },
      );
    }
    if (totalWeight(weights) === null) {
      throw GenerationError.configInvalid(
        "Weights must be non-negative and not all zero",
        { parameter: "weights", weights: [...weights] },
      );
    }
    const index = this.rng.weightedIndex(weights);
    const value = values[index];
    if (value === undefined) {
      throw GenerationError.configInvalid("Weighted sample out of range", {
        index,
      });
    }
    return value;
  }

  sampleDistribution<T>(distribution: Distribution<T>): T {
    return this.sampleWeighted(distribution.values, distribution.probs);
  }

  /**
   * Float in [min, max)
   */
  uniformFloat(min: number, max: number): number {
    return this.rng.uniform(min, max);
  }

  /**
   * Integer in [min, max], inclusive
   */
  uniformInt(min: number, max: number): number {
    return this.rng.range(min, max);
  }

  withProbability(probability: number): boolean {
    return this.rng.probability(probability);
  }

  // ===========================================================================
  // PROFILE DRAWS
  // ===========================================================================

  /**
   * Draw a shift from directions ranked best to worst. Rank `i` gets
   * `shiftWeights[i]`. If the remaining ranks all weigh zero the best one
   * is taken, still consuming a draw.
   */
  sampleShift(ranked: readonly ShiftDirection[]): ShiftDirection {
    const weights = this.profile.shiftWeights.slice(0, ranked.length);
    if (totalWeight(weights) === null) {
      this.rng.next();
      const best = ranked[0];
      if (best === undefined) {
        throw GenerationError.walkerStuck("No shift direction available");
      }
      return best;
    }
    return this.sampleWeighted(ranked, weights);
  }

  sampleInnerSize(): number {
    return this.sampleDistribution(this.profile.innerSizeProbs);
  }

  sampleOuterMargin(): number {
    return this.sampleDistribution(this.profile.outerMarginProbs);
  }

  sampleCircularity(): number {
    return this.sampleDistribution(this.profile.circProbs);
  }
}
