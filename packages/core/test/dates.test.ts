import { describe, it, expect } from 'vitest';
import { addDays, addRandomOffset, compareDates, randomDate, toDayNumber } from '../src/dates.js';
import { RandomSource } from '../src/random.js';
import { ConfigurationError } from '../src/errors.js';

describe('date helpers', () => {
  it('adds days across month and leap-year boundaries', () => {
    expect(addDays('2023-01-30', 2)).toBe('2023-02-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2023-02-28', 1)).toBe('2023-03-01');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
  });

  it('compares dates by calendar day', () => {
    expect(compareDates('2023-01-05', '2023-01-10')).toBe(-5);
    expect(compareDates('2023-01-10', '2023-01-10')).toBe(0);
    expect(compareDates('2024-01-01', '2023-12-31')).toBe(1);
  });

  it('rejects malformed and impossible dates', () => {
    expect(() => toDayNumber('2023-1-5')).toThrow(ConfigurationError);
    expect(() => toDayNumber('2023-02-30')).toThrow(ConfigurationError);
  });

  it('draws dates within inclusive bounds', () => {
    const random = new RandomSource(6);
    const seen = new Set<string>();
    for (let i = 0; i < 500; i++) {
      const date = randomDate(random, '2023-01-01', '2023-01-03');
      seen.add(date);
    }
    expect([...seen].sort()).toEqual(['2023-01-01', '2023-01-02', '2023-01-03']);
  });

  it('swaps reversed bounds', () => {
    const random = new RandomSource(6);
    for (let i = 0; i < 100; i++) {
      const date = randomDate(random, '2023-03-10', '2023-03-01');
      expect(compareDates(date, '2023-03-01')).toBeGreaterThanOrEqual(0);
      expect(compareDates(date, '2023-03-10')).toBeLessThanOrEqual(0);
    }
  });

  it('returns the single day of a zero-width range', () => {
    expect(randomDate(new RandomSource(1), '2024-07-04', '2024-07-04')).toBe('2024-07-04');
  });

  it('offsets a date by a bounded number of days', () => {
    const random = new RandomSource(12);
    for (let i = 0; i < 100; i++) {
      const date = addRandomOffset(random, '2023-01-10', 1, 7);
      const delta = compareDates(date, '2023-01-10');
      expect(delta).toBeGreaterThanOrEqual(1);
      expect(delta).toBeLessThanOrEqual(7);
    }
    expect(() => addRandomOffset(random, '2023-01-10', 5, 2)).toThrow(ConfigurationError);
  });
});
