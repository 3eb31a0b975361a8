/**
 * Kernel - the shape stamped around the walker each step.
 *
 * Membership rule, used everywhere a kernel is applied:
 *
 *   dx² + dy² ≤ lerp((r + ½)², 2r², circularity)
 *
 * Circularity 0 gives a disc, circularity 1 reaches the corners of the
 * (2r+1)² box, i.e. a square. Since 2 ≤ (r + ½)² for every r ≥ 1, a kernel
 * with radius ≥ 1 always covers the full 3x3 neighbourhood of its centre.
 */

import { GenerationError } from "@tunnelgen/contracts";
import { lerp } from "../geometry/operations";
import type { Point } from "../geometry/types";

export interface Kernel {
  readonly radius: number;
  readonly circularity: number;
}

export function createKernel(radius: number, circularity: number): Kernel {
  if (!Number.isInteger(radius) || radius < 0) {
    throw GenerationError.configInvalid(
      `Kernel radius must be a non-negative integer, got ${radius}`,
      { parameter: "radius", radius },
    );
  }
  if (!(circularity >= 0 && circularity <= 1)) {
    throw GenerationError.configInvalid(
      `Kernel circularity must be within [0, 1], got ${circularity}`,
      { parameter: "circularity", circularity },
    );
  }
  return { radius, circularity };
}

/**
 * Profiles describe kernels by size (diameter in cells).
 */
export function kernelSizeToRadius(size: number): number {
  return Math.max(0, Math.floor((size - 1) / 2));
}

export function kernelFromSize(size: number, circularity: number): Kernel {
  if (size <= 0) {
    throw GenerationError.configInvalid(
      `Kernel size must be larger than zero, got ${size}`,
      { parameter: "size", size },
    );
  }
  return createKernel(kernelSizeToRadius(size), circularity);
}

/**
 * Same shape with the radius raised to at least `minRadius`.
 */
export function withMinRadius(kernel: Kernel, minRadius: number): Kernel {
  return kernel.radius >= minRadius
    ? kernel
    : { radius: minRadius, circularity: kernel.circularity };
}

export function kernelThreshold(kernel: Kernel): number {
  const r = kernel.radius;
  return lerp((r + 0.5) * (r + 0.5), 2 * r * r, kernel.circularity);
}

export function kernelContains(kernel: Kernel, dx: number, dy: number): boolean {
  if (Math.abs(dx) > kernel.radius || Math.abs(dy) > kernel.radius) {
    return false;
  }
  return dx * dx + dy * dy <= kernelThreshold(kernel);
}

/**
 * Offsets just outside the kernel that edge fuzz may add:
 * `threshold < d² ≤ (r + 1)²`.
 */
export function isFuzzBand(kernel: Kernel, dx: number, dy: number): boolean {
  const d2 = dx * dx + dy * dy;
  const outer = (kernel.radius + 1) * (kernel.radius + 1);
  return d2 > kernelThreshold(kernel) && d2 <= outer;
}

/**
 * Member offsets in row-major order.
 */
export function kernelOffsets(kernel: Kernel): readonly Point[] {
  const offsets: Point[] = [];
  const r = kernel.radius;
  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      if (kernelContains(kernel, dx, dy)) offsets.push({ x: dx, y: dy });
    }
  }
  return offsets;
}
