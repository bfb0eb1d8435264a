/**
 * pascals-triangle — repeated values
 *
 * Searches rows 0..maxRow for values that occur at more than one position,
 * ignoring the trivial repeats: the 1s on the edges, n at (n, 1), and the
 * mirror image (n, n-k) of every (n, k).
 *
 *   findCollisions(21)   →  120 at (10, 3), (16, 2)
 *                           210 at (10, 4), (21, 2)
 *                          3003 at (14, 6), (15, 5)
 *
 * Only positions 2 ≤ k ≤ n/2 are searched. Along one row those values
 * strictly increase, so a heap holding one cursor per row yields every
 * searched value in ascending order, and equal values come out back to back.
 *
 * With FLOAT the search runs in doubles and groups approximately equal
 * values; confirmCollisions() then drops the false positives with exact
 * binomials.
 */

import { Column } from './column';
import { Entry } from './entry';
import { assertNonNegative } from './errors';
import { MinHeap } from './heap';
import { EXACT, binomial, valuesApproxEqual } from './numeric';
import type { Numeric, NumericValue } from './types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** One repeated value and every searched position that holds it, by row. */
export interface Collision<T extends NumericValue> {
  value:   T;
  entries: readonly Entry<T>[];
}

// ─── Search ───────────────────────────────────────────────────────────────────

/** Smallest row with a searched position (k = 2 needs n ≥ 4). */
const FIRST_SEARCHED_ROW = 4;

export function findCollisions(maxRow: number): Collision<bigint>[];
export function findCollisions<T extends NumericValue>(maxRow: number, numeric: Numeric<T>): Collision<T>[];
export function findCollisions<T extends NumericValue>(
  maxRow: number,
  numeric?: Numeric<T>,
): Collision<T>[] | Collision<bigint>[] {
  return numeric === undefined ? search(maxRow, EXACT) : search(maxRow, numeric);
}

function search<T extends NumericValue>(maxRow: number, numeric: Numeric<T>): Collision<T>[] {
  assertNonNegative('maxRow', maxRow);
  if (maxRow < FIRST_SEARCHED_ROW) return [];

  const heap = new MinHeap<Entry<T>>((a, b) => a.compare(b) || a.rowNumber - b.rowNumber);

  // Column 2 from row 2 to maxRow; rows 2 and 3 have no searched position.
  for (const e of Column.of(2, maxRow - 1, numeric).toArray()) {
    if (e.rowNumber >= FIRST_SEARCHED_ROW) heap.push(e);
  }

  const found: Collision<T>[] = [];
  let group: Entry<T>[] = [];

  const flush = (): void => {
    const first = group[0];
    if (first !== undefined && group.length >= 2) {
      found.push({
        value:   first.value,
        entries: group.slice().sort((a, b) => a.rowNumber - b.rowNumber),
      });
    }
    group = [];
  };

  for (let e = heap.pop(); e !== undefined; e = heap.pop()) {
    const head = group[0];
    if (head !== undefined && !valuesApproxEqual(head.value, e.value)) flush();
    group.push(e);

    if (2 * (e.rowPosition + 1) <= e.rowNumber) heap.push(e.right());
  }
  flush();

  return found;
}

// ─── Confirmation ─────────────────────────────────────────────────────────────

/**
 * Re-checks candidate collisions with exact binomials. Each candidate is
 * split by exact value; only parts with two or more positions survive.
 * The result holds exact entries, sorted by value.
 */
export function confirmCollisions(candidates: readonly Collision<NumericValue>[]): Collision<bigint>[] {
  const confirmed: Collision<bigint>[] = [];

  for (const candidate of candidates) {
    const buckets = new Map<bigint, Entry<bigint>[]>();
    for (const e of candidate.entries) {
      const value  = binomial(e.rowNumber, e.rowPosition);
      const bucket = buckets.get(value);
      const exact  = Entry.of(e.rowNumber, e.rowPosition);
      if (bucket === undefined) buckets.set(value, [exact]);
      else bucket.push(exact);
    }
    for (const [value, entries] of buckets) {
      if (entries.length >= 2) confirmed.push({ value, entries });
    }
  }

  return confirmed.sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
}
