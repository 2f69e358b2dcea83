/**
 * Temporal consistency engine.
 *
 * Corrects a (created, due, completed) triple so that
 * created <= due <= completed holds for every present field.
 */

import { addRandomOffset, compareDates, type IsoDate } from './dates.js';
import type { RandomSource } from './random.js';

export interface DateTriple {
  createdAt: IsoDate;
  dueDate: IsoDate | null;
  completedAt: IsoDate | null;
}

/** Days a violating date is pushed past its anchor */
const NUDGE_MIN_DAYS = 1;
const NUDGE_MAX_DAYS = 7;

/**
 * Reconcile a date triple.
 *
 * `createdAt` is authoritative. A due date before creation is moved to
 * created + U[1,7]. The completion date is then checked against the
 * (possibly corrected) due date, or the creation date when there is none,
 * and moved to that anchor + U[1,7] when it falls before it.
 *
 * Ordered input is returned unchanged without drawing from the stream,
 * so reconcile(reconcile(x)) equals reconcile(x).
 */
export function reconcile(
  random: RandomSource,
  createdAt: IsoDate,
  dueDate: IsoDate,
  completedAt?: IsoDate | null
): DateTriple & { dueDate: IsoDate };
export function reconcile(
  random: RandomSource,
  createdAt: IsoDate,
  dueDate?: IsoDate | null,
  completedAt?: IsoDate | null
): DateTriple;
export function reconcile(
  random: RandomSource,
  createdAt: IsoDate,
  dueDate: IsoDate | null = null,
  completedAt: IsoDate | null = null
): DateTriple {
  let due = dueDate;
  if (due !== null && compareDates(due, createdAt) < 0) {
    due = addRandomOffset(random, createdAt, NUDGE_MIN_DAYS, NUDGE_MAX_DAYS);
  }

  // Anchor on the corrected due date, never the original one
  const reference = due ?? createdAt;

  let completed = completedAt;
  if (completed !== null && compareDates(completed, reference) < 0) {
    completed = addRandomOffset(random, reference, NUDGE_MIN_DAYS, NUDGE_MAX_DAYS);
  }

  return { createdAt, dueDate: due, completedAt: completed };
}

/**
 * True when the triple already satisfies causal ordering.
 */
export function isChronological(triple: Partial<DateTriple> & { createdAt: IsoDate }): boolean {
  const due = triple.dueDate ?? null;
  const completed = triple.completedAt ?? null;
  if (due !== null && compareDates(due, triple.createdAt) < 0) return false;
  if (completed !== null && compareDates(completed, due ?? triple.createdAt) < 0) return false;
  return true;
}
