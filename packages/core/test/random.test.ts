import { describe, it, expect } from 'vitest';
import { RandomSource } from '../src/random.js';
import { ConfigurationError } from '../src/errors.js';

describe('RandomSource', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new RandomSource(42);
    const b = new RandomSource(42);
    const drawsA = Array.from({ length: 20 }, () => a.next());
    const drawsB = Array.from({ length: 20 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
  });

  it('restarts the sequence on reseed', () => {
    const random = new RandomSource(9);
    const first = [random.next(), random.next(), random.next()];
    random.reseed(9);
    expect([random.next(), random.next(), random.next()]).toEqual(first);
  });

  it('draws floats in [0, 1)', () => {
    const random = new RandomSource(1);
    for (let i = 0; i < 5000; i++) {
      const x = random.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('draws integers with both bounds inclusive', () => {
    const random = new RandomSource(3);
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i++) {
      const n = random.int(1, 7);
      expect(Number.isInteger(n)).toBe(true);
      seen.add(n);
    }
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('rejects invalid arguments', () => {
    const random = new RandomSource(3);
    expect(() => random.int(5, 1)).toThrow(ConfigurationError);
    expect(() => random.int(0.5, 2)).toThrow(ConfigurationError);
    expect(() => random.chance(1.5)).toThrow(ConfigurationError);
    expect(() => random.chance(-0.1)).toThrow(ConfigurationError);
    expect(() => random.pick([])).toThrow(ConfigurationError);
    expect(() => random.sample([1, 2], 3)).toThrow(ConfigurationError);
    expect(() => new RandomSource(Number.NaN)).toThrow(ConfigurationError);
  });

  it('samples distinct elements', () => {
    const random = new RandomSource(11);
    const items = ['a', 'b', 'c', 'd', 'e', 'f'];
    const picked = random.sample(items, 4);
    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    for (const item of picked) {
      expect(items).toContain(item);
    }
    expect(random.sample(items, 0)).toEqual([]);
  });

  it('shuffles into a new array holding the same elements', () => {
    const random = new RandomSource(5);
    const items = [1, 2, 3, 4, 5, 6, 7, 8];
    const shuffled = random.shuffle(items);
    expect(shuffled).not.toBe(items);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('always honours chance(0) and chance(1)', () => {
    const random = new RandomSource(8);
    for (let i = 0; i < 100; i++) {
      expect(random.chance(0)).toBe(false);
      expect(random.chance(1)).toBe(true);
    }
  });
});
