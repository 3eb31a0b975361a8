import { z } from "zod";

const Probability = z
  .number()
  .min(0, "Probabilities must be within [0, 1]")
  .max(1, "Probabilities must be within [0, 1]");

const Weight = z.number().nonnegative("Weights must be non-negative");

const NonNegativeInt = z.number().int().nonnegative();

const IntBounds = z
  .tuple([NonNegativeInt, NonNegativeInt])
  .refine(([min, max]) => min <= max, {
    message: "Lower bound must be ≤ upper bound",
  });

/**
 * Discrete distribution over `values`, weighted by `probs`.
 * Weights need not sum to 1 but must not all be zero.
 */
function distribution<T extends z.ZodType>(value: T) {
  return z
    .object({
      values: z.array(value).min(1, "Distribution needs at least one value"),
      probs: z.array(Weight).min(1, "Distribution needs at least one weight"),
    })
    .superRefine((data, ctx) => {
      if (data.values.length !== data.probs.length) {
        ctx.addIssue({
          code: "custom",
          message: `Distribution has ${data.values.length} values but ${data.probs.length} weights`,
          path: ["probs"],
        });
      }
      if (data.probs.every((p) => p === 0)) {
        ctx.addIssue({
          code: "custom",
          message: "Distribution weights are all zero",
          path: ["probs"],
        });
      }
    });
}

export const InnerSizeDistributionSchema = distribution(
  z.number().int().positive("Inner kernel size must be larger than zero"),
);
export const OuterMarginDistributionSchema = distribution(NonNegativeInt);
export const CircularityDistributionSchema = distribution(
  z.number().min(0).max(1),
);

export const ShiftWeightsSchema = z
  .array(Weight)
  .length(4, "Shift weights rank all four directions (best to worst)")
  .refine((weights) => weights.some((w) => w > 0), {
    message: "Shift weights are all zero",
  });

export const GenerationProfileSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    version: z.string(),

    innerRadMutProb: Probability,
    innerSizeMutProb: Probability,
    outerRadMutProb: Probability,
    outerSizeMutProb: Probability,

    /** Weights by rank, best direction towards the goal first */
    shiftWeights: ShiftWeightsSchema,

    platMinDistance: z.number().int().positive(),
    platWidthBounds: IntBounds,
    platHeightBounds: IntBounds,
    platMinEmptyHeight: NonNegativeInt,
    platSoftOverhang: z.boolean(),

    momentumProb: Probability,
    waypointReachedDistSqr: z.number().nonnegative(),

    innerSizeProbs: InnerSizeDistributionSchema,
    outerMarginProbs: OuterMarginDistributionSchema,
    circProbs: CircularityDistributionSchema,

    skipLengthBounds: IntBounds,
    skipMinSpacingSqr: z.number().nonnegative(),
    maxLevelSkipFraction: Probability,

    minFreezeSize: NonNegativeInt,

    enablePulse: z.boolean(),
    pulseStraightDelay: NonNegativeInt,
    pulseCornerDelay: NonNegativeInt,
    pulseMaxKernelSize: z.number().int().positive(),

    fadeSteps: NonNegativeInt,
    fadeMaxSize: z
      .number()
      .int()
      .positive("Fade kernel sizes must be larger than zero"),
    fadeMinSize: z
      .number()
      .int()
      .positive("Fade kernel sizes must be larger than zero"),

    maxSubwaypointDist: z
      .number()
      .positive("Max subwaypoint distance must be > 0"),
    subwaypointMaxShiftDist: z.number().nonnegative(),

    posLockMaxDist: z.number().nonnegative(),
    posLockMaxDelay: z.number().int().positive(),
    lockKernelSize: z.number().int().positive(),

    kernelEdgeFuzzProb: Probability,
    roomMargin: z.number().int().min(2, "Room margin must be at least 2"),
  })
  .superRefine((data, ctx) => {
    if (data.platWidthBounds[0] < 1 || data.platHeightBounds[0] < 1) {
      ctx.addIssue({
        code: "custom",
        message: "Platforms must be at least 1x1",
        path: ["platWidthBounds"],
      });
    }
    if (data.skipLengthBounds[0] < 1) {
      ctx.addIssue({
        code: "custom",
        message: "Skips must cross at least one cell",
        path: ["skipLengthBounds"],
      });
    }
  });

export type GenerationProfile = z.infer<typeof GenerationProfileSchema>;
export type GenerationProfileInput = z.input<typeof GenerationProfileSchema>;
export type Distribution<T> = {
  readonly values: readonly T[];
  readonly probs: readonly number[];
};
