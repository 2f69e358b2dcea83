import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { isChronological, reconcile } from '../src/chronology.js';
import { compareDates, fromDayNumber, toDayNumber } from '../src/dates.js';
import { RandomSource } from '../src/random.js';

const START = toDayNumber('2020-01-01');
const END = toDayNumber('2026-12-31');

const dateArb = fc.integer({ min: START, max: END }).map(fromDayNumber);
const optionalDateArb = fc.option(dateArb, { nil: null });

describe('reconcile', () => {
  it('repairs a due date and completion that precede creation', () => {
    const result = reconcile(new RandomSource(42), '2023-01-10', '2023-01-05', '2023-01-05');

    expect(result.createdAt).toBe('2023-01-10');
    const dueDelta = compareDates(result.dueDate, '2023-01-10');
    expect(dueDelta).toBeGreaterThanOrEqual(1);
    expect(dueDelta).toBeLessThanOrEqual(7);

    expect(result.completedAt).not.toBeNull();
    const completedDelta = compareDates(result.completedAt ?? '', result.dueDate);
    expect(completedDelta).toBeGreaterThanOrEqual(1);
    expect(completedDelta).toBeLessThanOrEqual(7);
  });

  it('anchors completion on creation when there is no due date', () => {
    const result = reconcile(new RandomSource(1), '2023-06-01', null, '2023-05-01');
    expect(result.dueDate).toBeNull();
    const delta = compareDates(result.completedAt ?? '', '2023-06-01');
    expect(delta).toBeGreaterThanOrEqual(1);
    expect(delta).toBeLessThanOrEqual(7);
  });

  it('keeps absent fields absent', () => {
    expect(reconcile(new RandomSource(1), '2023-06-01')).toEqual({
      createdAt: '2023-06-01',
      dueDate: null,
      completedAt: null,
    });
  });

  it('leaves ordered input untouched without drawing', () => {
    const random = new RandomSource(5);
    const result = reconcile(random, '2023-01-01', '2023-01-01', '2023-02-01');
    expect(result).toEqual({ createdAt: '2023-01-01', dueDate: '2023-01-01', completedAt: '2023-02-01' });
    expect(random.next()).toBe(new RandomSource(5).next());
  });

  it('always yields chronological output', () => {
    fc.assert(
      fc.property(fc.integer(), dateArb, optionalDateArb, optionalDateArb, (seed, created, due, completed) => {
        const result = reconcile(new RandomSource(seed), created, due, completed);
        expect(isChronological(result)).toBe(true);
        expect(result.dueDate === null).toBe(due === null);
        expect(result.completedAt === null).toBe(completed === null);
      })
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(fc.integer(), dateArb, optionalDateArb, optionalDateArb, (seed, created, due, completed) => {
        const once = reconcile(new RandomSource(seed), created, due, completed);
        const twice = reconcile(new RandomSource(seed + 1), once.createdAt, once.dueDate, once.completedAt);
        expect(twice).toEqual(once);
      })
    );
  });
});

describe('isChronological', () => {
  it('detects each kind of violation', () => {
    expect(isChronological({ createdAt: '2023-01-10', dueDate: '2023-01-09' })).toBe(false);
    expect(isChronological({ createdAt: '2023-01-10', dueDate: '2023-01-12', completedAt: '2023-01-11' })).toBe(false);
    expect(isChronological({ createdAt: '2023-01-10', completedAt: '2023-01-09' })).toBe(false);
    expect(isChronological({ createdAt: '2023-01-10', dueDate: '2023-01-10', completedAt: '2023-01-10' })).toBe(true);
  });
});
