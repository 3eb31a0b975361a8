import { DEFAULT_GENERATION_PROFILE } from "@tunnelgen/contracts";
import { describe, expect, it } from "vitest";
import { fadeInnerSize, pulseDelay } from "../src/walker/kernel-schedule";

describe("fadeInnerSize", () => {
  const profile = DEFAULT_GENERATION_PROFILE;

  it("shrinks from fadeMaxSize towards fadeMinSize", () => {
    expect(fadeInnerSize(0, profile)).toBe(6);
    expect(fadeInnerSize(30, profile)).toBe(4);
    expect(fadeInnerSize(59, profile)).toBe(3);
  });

  it("ends after fadeSteps", () => {
    expect(fadeInnerSize(60, profile)).toBeNull();
    expect(fadeInnerSize(0, { ...profile, fadeSteps: 0 })).toBeNull();
  });
});

describe("pulseDelay", () => {
  const profile = DEFAULT_GENERATION_PROFILE;

  it("uses the straight delay along one axis", () => {
    expect(pulseDelay("up", "down", profile)).toBe(10);
    expect(pulseDelay("left", "left", profile)).toBe(10);
  });

  it("uses the corner delay after a turn", () => {
    expect(pulseDelay("up", "left", profile)).toBe(5);
  });

  it("counts a walker without two shifts as straight", () => {
    expect(pulseDelay(null, "right", profile)).toBe(10);
  });
});
