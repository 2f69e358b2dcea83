/**
 * Weighted categorical sampler
 */

import { InvalidDistribution } from './errors.js';
import type { RandomSource } from './random.js';

/** Label → positive weight. Weights need not sum to anything in particular. */
export type Distribution<L extends string> = Readonly<Record<L, number>>;

export function validateDistribution<L extends string>(weights: Distribution<L>): number {
  let total = 0;
  let size = 0;
  for (const label in weights) {
    const weight = weights[label];
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InvalidDistribution(`Weight for "${label}" must be a positive number, got ${weight}`);
    }
    total += weight;
    size++;
  }
  if (size === 0) {
    throw new InvalidDistribution('Distribution must contain at least one label');
  }
  return total;
}

/**
 * Draw one label with probability proportional to its weight.
 */
export function choose<L extends string>(random: RandomSource, weights: Distribution<L>): L {
  const total = validateDistribution(weights);
  const target = random.next() * total;

  let cumulative = 0;
  let last: L | undefined;
  for (const label in weights) {
    cumulative += weights[label];
    last = label;
    if (target < cumulative) return label;
  }

  // Float rounding can leave target == total
  if (last === undefined) {
    throw new InvalidDistribution('Distribution must contain at least one label');
  }
  return last;
}
