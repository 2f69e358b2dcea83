/**
 * Deterministic random source.
 *
 * A single reseedable mulberry32 stream backs every sampling decision of a run.
 * Reseeding mid-run (the default per-phase policy) makes output depend on the
 * order in which phases draw from the stream, not only on the seed value.
 */

import { ConfigurationError } from './errors.js';

export class RandomSource {
  private state = 0;

  constructor(seed: number) {
    this.reseed(seed);
  }

  /** Reset the stream to the start of the sequence for `seed` */
  reseed(seed: number): void {
    if (!Number.isFinite(seed)) {
      throw new ConfigurationError(`Seed must be a finite number, got ${seed}`);
    }
    this.state = Math.trunc(seed) | 0;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
      throw new ConfigurationError(`Invalid integer range [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /** Uniform float in [min, max) */
  float(min: number, max: number): number {
    if (min > max) {
      throw new ConfigurationError(`Invalid float range [${min}, ${max})`);
    }
    return min + this.next() * (max - min);
  }

  /** True with probability `p` */
  chance(p: number): boolean {
    if (!(p >= 0 && p <= 1)) {
      throw new ConfigurationError(`Probability must be between 0 and 1, got ${p}`);
    }
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new ConfigurationError('Cannot pick from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }

  /** `k` distinct elements in draw order (partial Fisher-Yates on a copy) */
  sample<T>(items: readonly T[], k: number): T[] {
    if (!Number.isInteger(k) || k < 0 || k > items.length) {
      throw new ConfigurationError(`Cannot sample ${k} of ${items.length} items`);
    }
    const pool = [...items];
    for (let i = 0; i < k; i++) {
      const j = i + Math.floor(this.next() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, k);
  }

  /** Shuffled copy of `items` */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}
