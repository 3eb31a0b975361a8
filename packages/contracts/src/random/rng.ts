/**
 * Random helpers that work on any `() => number` source returning [0, 1).
 */

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Random float in [min, max)
 */
export function uniform(rng: () => number, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Boolean with given probability
 * @param chance - The probability (0 to 1) of returning true
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}

/**
 * Total weight of a distribution, or null when it cannot be sampled
 * (empty, negative or non-finite entries, or all zeros).
 */
export function totalWeight(weights: readonly number[]): number | null {
  let total = 0;
  for (const weight of weights) {
    if (!Number.isFinite(weight) || weight < 0) return null;
    total += weight;
  }
  return total > 0 ? total : null;
}

/**
 * Index drawn with probability proportional to its weight.
 * Consumes exactly one value from `rng`.
 *
 * @returns The chosen index, or -1 when the weights cannot be sampled
 */
export function weightedIndex(
  rng: () => number,
  weights: readonly number[],
): number {
  const total = totalWeight(weights);
  if (total === null) return -1;

  let remaining = rng() * total;
  let lastPositive = -1;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i] ?? 0;
    if (weight <= 0) continue;
    lastPositive = i;
    if (remaining < weight) return i;
    remaining -= weight;
  }
  // Floating point leftovers land on the last non-zero bucket
  return lastPositive;
}
