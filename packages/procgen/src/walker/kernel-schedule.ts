/**
 * Step-driven kernel sizes: fade at the start of a run, pulse on a counter.
 * Neither draws randomness.
 */

import type { GenerationProfile } from "@tunnelgen/contracts";
import { areCollinear, lerp } from "../core/geometry/operations";
import type { ShiftDirection } from "../core/geometry/types";

/**
 * Inner kernel size while fading, or null once `step` is past `fadeSteps`.
 */
export function fadeInnerSize(
  step: number,
  profile: GenerationProfile,
): number | null {
  if (step >= profile.fadeSteps) return null;
  return Math.floor(
    lerp(profile.fadeMaxSize, profile.fadeMinSize, step / profile.fadeSteps),
  );
}

/**
 * Steps between pulses. A walker with fewer than two shifts counts as
 * going straight.
 */
export function pulseDelay(
  previous: ShiftDirection | null,
  last: ShiftDirection | null,
  profile: GenerationProfile,
): number {
  const straight =
    previous === null || last === null || areCollinear(previous, last);
  return straight ? profile.pulseStraightDelay : profile.pulseCornerDelay;
}
