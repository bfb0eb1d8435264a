/**
 * pascals-triangle — Row
 *
 * One full row C(n, 0) … C(n, n), stored with the redundancy taken out.
 *
 * ── Edge-elided storage ──────────────────────────────────────────────────────
 *
 * Positions 0 and 1 always hold 1 and n, and the row is a palindrome. Only
 * positions 2 … up to the midpoint are stored:
 *
 *   n = 6:   1  6 [15 20] 15  6  1        slots: [15, 20]
 *   n = 7:   1  7 [21 35 35] 21  7  1     slots: [21, 35, 35]
 *
 * numElements(n) = 0 for n ≤ 3, else ⌈(n-2)/2⌉. On odd rows the last slot is
 * the mirror of the one before it. A read never consults it, but it lets the
 * odd → even advance run the same recurrence as every other slot.
 *
 * A read reflects the index about n/2 and maps it to a slot:
 *
 *   r = min(i, n - i)     r = 0 → 1     r = 1 → n     else → slot r - 2
 *
 * ── Advancing and retreating ─────────────────────────────────────────────────
 *
 * moveNext() applies Pascal's rule to every slot in place, from the highest
 * slot down so that each slot still sees its predecessor's old value. When
 * row n+1 needs one more slot than row n, the new slot is first seeded with
 * the current row's value at that position (read through symmetry). movePrev()
 * inverts the recurrence from the lowest slot up.
 *
 * The backing array may be allocated for a larger row than the current one
 * (see Row.of's capacity), so repeated advances reuse it instead of growing it.
 */

import { DISPLAY_HALF, DISPLAY_THRESHOLD } from './constants';
import { Entry } from './entry';
import { DomainError, OutOfBoundsError, assertInteger, assertNonNegative } from './errors';
import { EXACT, binomial, valuesEqual } from './numeric';
import { ZeroRange } from './range';
import type { Numeric, NumericValue } from './types';

/** Number of stored slots needed to represent row `rowNumber`. */
export function numElements(rowNumber: number): number {
  return rowNumber <= 3 ? 0 : Math.ceil((rowNumber - 2) / 2);
}

// ─── Row ──────────────────────────────────────────────────────────────────────

export class Row<T extends NumericValue> implements Iterable<T> {
  private _rowNumber: number;
  private readonly _data: T[];

  /**
   * A row from its stored slots. The slot values are not checked; isValid()
   * does that. `data` is copied.
   *
   * @throws DomainError when rowNumber is negative or `data` is shorter than
   *                     numElements(rowNumber).
   */
  constructor(rowNumber: number, data: readonly T[], readonly numeric: Numeric<T>) {
    assertNonNegative('rowNumber', rowNumber);
    if (data.length < numElements(rowNumber)) {
      throw new DomainError(
        `Row ${rowNumber} stores ${numElements(rowNumber)} values; ` +
        `got ${data.length}.`,
      );
    }
    this._rowNumber = rowNumber;
    this._data      = data.slice();
  }

  /**
   * Compute row `rowNumber`. The stored slots are filled by moving right from
   * (n, 1), whose value is n.
   *
   * @param capacity  Largest row the backing array is sized for. Defaults to
   *                  rowNumber; pass more to advance without reallocating.
   */
  static of(rowNumber: number): Row<bigint>;
  static of<T extends NumericValue>(rowNumber: number, numeric: Numeric<T>, capacity?: number): Row<T>;
  static of<T extends NumericValue>(
    rowNumber: number,
    numeric?: Numeric<T>,
    capacity: number = rowNumber,
  ): Row<T> | Row<bigint> {
    return numeric === undefined
      ? computeRow(rowNumber, EXACT, capacity)
      : computeRow(rowNumber, numeric, capacity);
  }

  /** Deep copy; the backing array is duplicated, capacity included. */
  copy(): Row<T> {
    return new Row(this._rowNumber, this._data, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get rowNumber(): number {
    return this._rowNumber;
  }

  /** Number of values in the row: n + 1. */
  get size(): number {
    return this._rowNumber + 1;
  }

  get firstIndex(): number {
    return 0;
  }

  get lastIndex(): number {
    return this._rowNumber;
  }

  get axes(): ZeroRange {
    return new ZeroRange(this._rowNumber);
  }

  /** Allocated slots, which may exceed numElements(rowNumber). */
  get capacity(): number {
    return this._data.length;
  }

  /**
   * C(n, i).
   *
   * @throws RangeError unless 0 ≤ i ≤ n.
   */
  get(i: number): T {
    if (!Number.isInteger(i) || i < 0 || i > this._rowNumber) {
      throw new RangeError(`Row index ${i} out of range 0..${this._rowNumber}.`);
    }
    return this.reflected(Math.min(i, this._rowNumber - i));
  }

  /** Value at reflected index r, 0 ≤ r ≤ n/2. */
  private reflected(r: number): T {
    if (r === 0) return this.numeric.one;
    if (r === 1) return this.numeric.fromInt(this._rowNumber);
    return this._data[r - 2]!;
  }

  /** Dense copy of the full row. */
  values(): T[] {
    const out: T[] = [];
    for (let i = 0; i <= this._rowNumber; i++) out.push(this.get(i));
    return out;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i <= this._rowNumber; i++) yield this.get(i);
  }

  // ── Movement (in place) ────────────────────────────────────────────────────

  moveNext(): this {
    const n         = this._rowNumber;
    const count     = numElements(n);
    const nextCount = numElements(n + 1);
    const data      = this._data;
    const num       = this.numeric;

    if (nextCount > count) {
      // The new slot sits at position nextCount + 1 of row n+1; Pascal's rule
      // below adds the old value at that position to its left neighbour.
      const seed = this.get(nextCount + 1);
      if (data.length > count) data[count] = seed;
      else data.push(seed);
    }

    for (let s = nextCount - 1; s >= 1; s--) {
      data[s] = num.add(data[s]!, data[s - 1]!);
    }
    if (nextCount >= 1) data[0] = num.add(data[0]!, num.fromInt(n));

    this._rowNumber = n + 1;
    return this;
  }

  movePrev(): this {
    if (this.isFirst()) throw new OutOfBoundsError('no previous row');

    const m     = this._rowNumber - 1;
    const count = numElements(m);
    const data  = this._data;
    const num   = this.numeric;

    if (count >= 1) {
      data[0] = num.sub(data[0]!, num.fromInt(m));
      for (let s = 1; s < count; s++) {
        data[s] = num.sub(data[s]!, data[s - 1]!);
      }
    }

    this._rowNumber = m;
    return this;
  }

  moveDown(): this { return this.moveNext(); }
  moveUp(): this   { return this.movePrev(); }

  // ── Movement (copying) ─────────────────────────────────────────────────────

  next(): Row<T> { return this.copy().moveNext(); }
  prev(): Row<T> { return this.copy().movePrev(); }
  down(): Row<T> { return this.copy().moveNext(); }
  up(): Row<T>   { return this.copy().movePrev(); }

  // ── Reductions ─────────────────────────────────────────────────────────────

  /** Σ C(n, i) = 2^n. */
  sum(): T {
    return this.numeric.fromBigInt(1n << BigInt(this._rowNumber));
  }

  /**
   * Σ f(C(n, i)) over the whole row. Each stored value is visited once and
   * counted twice, except the middle of an even row.
   */
  sumOf(f: (value: T) => T): T {
    const n   = this._rowNumber;
    const num = this.numeric;
    let acc   = num.zero;
    for (let r = 0; 2 * r <= n; r++) {
      const term = f(this.reflected(r));
      acc = num.add(acc, 2 * r === n ? term : num.add(term, term));
    }
    return acc;
  }

  // ── Checks ─────────────────────────────────────────────────────────────────

  isFirst(): boolean {
    return this._rowNumber === 0;
  }

  /** Same row number and the same stored values, across numeric types. */
  equals(other: Row<NumericValue>): boolean {
    if (this._rowNumber !== other._rowNumber) return false;
    const count = numElements(this._rowNumber);
    for (let s = 0; s < count; s++) {
      if (!valuesEqual(this._data[s]!, other._data[s]!)) return false;
    }
    return true;
  }

  /**
   * Recomputes every stored slot as an exact binomial and compares. Costs
   * O(n²) big-integer work; a diagnostic, not a hot-path check.
   */
  isValid(): boolean {
    const count = numElements(this._rowNumber);
    if (this._data.length < count) return false;
    for (let s = 0; s < count; s++) {
      if (this.numeric.toExact(this._data[s]!) !== binomial(this._rowNumber, s + 2)) return false;
    }
    return true;
  }

  // ── Conversion ─────────────────────────────────────────────────────────────

  toArray(): Entry<T>[] {
    const out: Entry<T>[] = [];
    for (let i = 0; i <= this._rowNumber; i++) {
      out.push(new Entry(this._rowNumber, i, this.get(i), this.numeric));
    }
    return out;
  }

  /** `<1, 5, 10, 10, 5, 1>`; long rows show DISPLAY_HALF values at each end. */
  toString(): string {
    const v = this.values();
    if (v.length < DISPLAY_THRESHOLD) return `<${v.join(', ')}>`;
    const head = v.slice(0, DISPLAY_HALF).join(', ');
    const tail = v.slice(v.length - DISPLAY_HALF).join(', ');
    return `<${head}, ..., ${tail}>`;
  }
}

function computeRow<T extends NumericValue>(
  rowNumber: number,
  numeric:   Numeric<T>,
  capacity:  number,
): Row<T> {
  assertNonNegative('rowNumber', rowNumber);
  assertInteger('capacity', capacity);
  if (capacity < rowNumber) {
    throw new DomainError(
      `capacity ${capacity} is not enough to store row ${rowNumber}.`,
    );
  }

  const data  = new Array<T>(numElements(capacity)).fill(numeric.zero);
  const count = numElements(rowNumber);
  if (count >= 1) {
    const entry = new Entry(rowNumber, 1, numeric.fromInt(rowNumber), numeric);
    for (let s = 0; s < count; s++) {
      data[s] = entry.moveRight().value;
    }
  }
  return new Row(rowNumber, data, numeric);
}
