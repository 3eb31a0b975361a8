import type { GenerationProfile } from "@tunnelgen/contracts";
import {
  clamp,
  euclideanDistance,
  lerp,
} from "../core/geometry/operations";
import type { Dimensions, Point } from "../core/geometry/types";
import type { WeightedSampler } from "../core/random/weighted-sampler";

/**
 * Split every leg longer than `maxSubwaypointDist` into equal parts.
 * Intermediate points are jittered by up to `subwaypointMaxShiftDist` on
 * each axis and clamped inside the grid. Original waypoints are kept as is.
 */
export function insertSubwaypoints(
  waypoints: readonly Point[],
  profile: GenerationProfile,
  sampler: WeightedSampler,
  dimensions: Dimensions,
): Point[] {
  const jitter = Math.floor(profile.subwaypointMaxShiftDist);
  const result: Point[] = [];
  let previous: Point | undefined;

  for (const waypoint of waypoints) {
    if (previous) {
      const segments = Math.ceil(
        euclideanDistance(previous, waypoint) / profile.maxSubwaypointDist,
      );
      for (let i = 1; i < segments; i++) {
        const t = i / segments;
        const x =
          Math.round(lerp(previous.x, waypoint.x, t)) +
          sampler.uniformInt(-jitter, jitter);
        const y =
          Math.round(lerp(previous.y, waypoint.y, t)) +
          sampler.uniformInt(-jitter, jitter);
        result.push({
          x: clamp(x, 0, dimensions.width - 1),
          y: clamp(y, 0, dimensions.height - 1),
        });
      }
    }
    result.push({ x: waypoint.x, y: waypoint.y });
    previous = waypoint;
  }

  return result;
}
