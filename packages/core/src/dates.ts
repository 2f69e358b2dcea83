/**
 * Calendar date helpers.
 *
 * All dates are ISO calendar dates (YYYY-MM-DD) handled as UTC day numbers,
 * so lexical order and chronological order agree.
 */

import { ConfigurationError } from './errors.js';
import type { RandomSource } from './random.js';

/** ISO calendar date, YYYY-MM-DD */
export type IsoDate = string;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Days since 1970-01-01 */
export function toDayNumber(date: IsoDate): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new ConfigurationError(`Invalid ISO date "${date}"`);
  }
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const days = ms / MS_PER_DAY;
  if (fromDayNumber(days) !== date) {
    throw new ConfigurationError(`Invalid calendar date "${date}"`);
  }
  return days;
}

export function fromDayNumber(days: number): IsoDate {
  return new Date(days * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromDayNumber(toDayNumber(date) + days);
}

export function compareDates(a: IsoDate, b: IsoDate): number {
  return toDayNumber(a) - toDayNumber(b);
}

/**
 * Uniformly random date between `start` and `end`, both inclusive.
 * Reversed bounds are swapped.
 */
export function randomDate(random: RandomSource, start: IsoDate, end: IsoDate): IsoDate {
  let from = toDayNumber(start);
  let to = toDayNumber(end);
  if (from > to) {
    [from, to] = [to, from];
  }
  return fromDayNumber(from + random.int(0, to - from));
}

/**
 * `base` plus a uniformly random number of days in [daysMin, daysMax].
 */
export function addRandomOffset(
  random: RandomSource,
  base: IsoDate,
  daysMin: number,
  daysMax: number
): IsoDate {
  if (daysMin < 0 || daysMax < daysMin) {
    throw new ConfigurationError(`Invalid day offset range [${daysMin}, ${daysMax}]`);
  }
  return addDays(base, random.int(daysMin, daysMax));
}
