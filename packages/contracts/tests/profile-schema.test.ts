import { describe, expect, it } from "vitest";
import {
  DEFAULT_GENERATION_PROFILE,
  DEFAULT_MAP_SKELETON,
  GenerationProfileSchema,
  MapSkeletonSchema,
} from "../src";

describe("GenerationProfileSchema", () => {
  it("accepts the default profile", () => {
    const res = GenerationProfileSchema.safeParse(DEFAULT_GENERATION_PROFILE);
    expect(res.success).toBe(true);
  });

  it("rejects a zero inner kernel size", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      innerSizeProbs: { values: [0, 5], probs: [0.5, 0.5] },
    });
    expect(res.success).toBe(false);
  });

  it("rejects distributions whose lengths differ", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      outerMarginProbs: { values: [0, 2], probs: [1] },
    });
    expect(res.success).toBe(false);
  });

  it("rejects all-zero weights", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      circProbs: { values: [0, 1], probs: [0, 0] },
    });
    expect(res.success).toBe(false);
  });

  it("requires exactly four shift weights", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      shiftWeights: [0.5, 0.3, 0.2],
    });
    expect(res.success).toBe(false);
  });

  it("rejects inverted bounds", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      skipLengthBounds: [11, 3],
    });
    expect(res.success).toBe(false);
  });

  it("rejects a non-positive subwaypoint distance", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      maxSubwaypointDist: 0,
    });
    expect(res.success).toBe(false);
  });

  it("rejects probabilities above one", () => {
    const res = GenerationProfileSchema.safeParse({
      ...DEFAULT_GENERATION_PROFILE,
      momentumProb: 1.5,
    });
    expect(res.success).toBe(false);
  });
});

describe("MapSkeletonSchema", () => {
  it("accepts the default skeleton", () => {
    expect(MapSkeletonSchema.safeParse(DEFAULT_MAP_SKELETON).success).toBe(
      true,
    );
  });

  it("rejects waypoints outside the grid", () => {
    const res = MapSkeletonSchema.safeParse({
      name: "tiny",
      width: 20,
      height: 20,
      waypoints: [{ x: 5, y: 5 }, { x: 25, y: 5 }],
    });
    expect(res.success).toBe(false);
  });

  it("rejects an empty waypoint list", () => {
    const res = MapSkeletonSchema.safeParse({
      name: "empty",
      width: 20,
      height: 20,
      waypoints: [],
    });
    expect(res.success).toBe(false);
  });
});
