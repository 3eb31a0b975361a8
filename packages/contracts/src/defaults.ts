import type { MapSkeleton } from "./schemas/map-skeleton";
import type { GenerationProfile } from "./schemas/profile";

export const DEFAULT_GENERATION_PROFILE: GenerationProfile = {
  name: "hookable",
  description: "Default tunnel profile",
  version: "1.0.0",

  innerRadMutProb: 0.25,
  innerSizeMutProb: 0.5,
  outerRadMutProb: 0.25,
  outerSizeMutProb: 0.5,

  shiftWeights: [0.4, 0.22, 0.2, 0.18],

  platMinDistance: 75,
  platWidthBounds: [3, 5],
  platHeightBounds: [1, 2],
  platMinEmptyHeight: 4,
  platSoftOverhang: false,

  momentumProb: 0.01,
  waypointReachedDistSqr: 250,

  innerSizeProbs: { values: [3, 5], probs: [0.25, 0.75] },
  outerMarginProbs: { values: [0, 2], probs: [0.5, 0.5] },
  circProbs: { values: [0.0, 0.6, 0.8], probs: [0.75, 0.15, 0.05] },

  skipLengthBounds: [3, 11],
  skipMinSpacingSqr: 45,
  maxLevelSkipFraction: 0.1,

  minFreezeSize: 0,

  enablePulse: false,
  pulseStraightDelay: 10,
  pulseCornerDelay: 5,
  pulseMaxKernelSize: 4,

  fadeSteps: 60,
  fadeMaxSize: 6,
  fadeMinSize: 3,

  maxSubwaypointDist: 50,
  subwaypointMaxShiftDist: 5,

  posLockMaxDist: 20,
  posLockMaxDelay: 1000,
  lockKernelSize: 9,

  kernelEdgeFuzzProb: 0,
  roomMargin: 4,
};

export const DEFAULT_MAP_SKELETON: MapSkeleton = {
  name: "serpentine",
  width: 300,
  height: 300,
  waypoints: [
    { x: 50, y: 250 },
    { x: 250, y: 250 },
    { x: 250, y: 150 },
    { x: 50, y: 150 },
    { x: 50, y: 50 },
    { x: 250, y: 50 },
  ],
};
