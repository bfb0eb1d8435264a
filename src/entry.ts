/**
 * pascals-triangle — Entry
 *
 * A single position (n, k) of Pascal's triangle and its value C(n, k).
 *
 * Entries move in place: moveUp(), moveRight() and friends rewrite the
 * coordinates and derive the new value from the old one via the movement
 * algebra. The pure forms (up(), right(), …) copy first and then move the
 * copy. The mutating form is the canonical one; every pure form is defined
 * in terms of it.
 *
 *   const e = Entry.of(30, 11);   // (30, 11, 54627300n)
 *   e.right();                    // (30, 12, 86493225n); e unchanged
 *   e.moveDown().moveDown();      // e is now (32, 11, …)
 *
 * A value passed to the constructor is not checked against C(n, k); use
 * isValid() when in doubt. Coordinates always are checked.
 */

import { DomainError, NonAdjacentError, OutOfBoundsError, assertInteger } from './errors';
import {
  downRightValue,
  downValue,
  leftValue,
  rightValue,
  upLeftValue,
  upValue,
} from './movement';
import {
  EXACT,
  binomial,
  compareValues,
  valuesApproxEqual,
  valuesEqual,
} from './numeric';
import type { Coordinates, Numeric, NumericValue } from './types';

function assertCoordinates(n: number, k: number): void {
  assertInteger('Entry row number', n);
  assertInteger('Entry row position', k);
  if (!(0 <= k && k <= n)) {
    throw new DomainError(`Entry requires 0 ≤ k ≤ n but n:${n}, k:${k}`);
  }
}

// ─── Entry ────────────────────────────────────────────────────────────────────

export class Entry<T extends NumericValue> {
  private _n: number;
  private _k: number;
  private _value: T;

  constructor(n: number, k: number, value: T, readonly numeric: Numeric<T>) {
    assertCoordinates(n, k);
    this._n     = n;
    this._k     = k;
    this._value = value;
  }

  /** The entry at (n, k) with its value from the binomial formula. */
  static of(n: number, k: number): Entry<bigint>;
  static of<T extends NumericValue>(n: number, k: number, numeric: Numeric<T>): Entry<T>;
  static of<T extends NumericValue>(
    n: number,
    k: number,
    numeric?: Numeric<T>,
  ): Entry<T> | Entry<bigint> {
    return numeric === undefined ? binomialEntry(n, k, EXACT) : binomialEntry(n, k, numeric);
  }

  /** Same as Entry.of(n, k), from an [n, k] pair. */
  static fromPair(pair: Coordinates): Entry<bigint>;
  static fromPair<T extends NumericValue>(pair: Coordinates, numeric: Numeric<T>): Entry<T>;
  static fromPair<T extends NumericValue>(
    pair: Coordinates,
    numeric?: Numeric<T>,
  ): Entry<T> | Entry<bigint> {
    const [n, k] = pair;
    return numeric === undefined ? binomialEntry(n, k, EXACT) : binomialEntry(n, k, numeric);
  }

  copy(): Entry<T> {
    return new Entry(this._n, this._k, this._value, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get rowNumber(): number {
    return this._n;
  }

  get rowPosition(): number {
    return this._k;
  }

  get value(): T {
    return this._value;
  }

  // ── Predicates ─────────────────────────────────────────────────────────────

  /** The apex (0, 0). */
  isFirst(): boolean {
    return this._n === 0 && this._k === 0;
  }

  isAtLeft(): boolean {
    return this._k <= 0;
  }

  isAtRight(): boolean {
    return this._k >= this._n;
  }

  /** Neither edge of a row with at least three entries. */
  isInterior(): boolean {
    return this._n >= 2 && this._k >= 1 && this._k < this._n;
  }

  /** True when the stored value equals C(n, k) exactly. */
  isValid(): boolean {
    return this.numeric.toExact(this._value) === binomial(this._n, this._k);
  }

  // ── Movement (in place) ────────────────────────────────────────────────────

  moveUp(): this {
    if (this.isAtRight() || this.isFirst()) {
      throw new OutOfBoundsError('no entry above');
    }
    this._value = upValue(this.numeric, this._n, this._k, this._value);
    this._n    -= 1;
    return this;
  }

  moveDown(): this {
    this._value = downValue(this.numeric, this._n, this._k, this._value);
    this._n    += 1;
    return this;
  }

  moveLeft(): this {
    if (this.isAtLeft()) throw new OutOfBoundsError('no entry to the left');
    this._value = leftValue(this.numeric, this._n, this._k, this._value);
    this._k    -= 1;
    return this;
  }

  moveRight(): this {
    if (this.isAtRight()) throw new OutOfBoundsError('no entry to the right');
    this._value = rightValue(this.numeric, this._n, this._k, this._value);
    this._k    += 1;
    return this;
  }

  /** Diagonal step to (n-1, k-1). */
  moveUpLeft(): this {
    if (this.isAtLeft()) throw new OutOfBoundsError('no entry up and to the left');
    this._value = upLeftValue(this.numeric, this._n, this._k, this._value);
    this._n    -= 1;
    this._k    -= 1;
    return this;
  }

  /** Diagonal step to (n+1, k+1). */
  moveDownRight(): this {
    this._value = downRightValue(this.numeric, this._n, this._k, this._value);
    this._n    += 1;
    this._k    += 1;
    return this;
  }

  /** Reflect to (n, n-k). The value is unchanged by symmetry. */
  moveMirror(): this {
    this._k = this._n - this._k;
    return this;
  }

  /**
   * Step back in reading order: left, or from the left edge to the last
   * entry of the row above (whose value is 1).
   */
  movePrev(): this {
    if (this.isFirst()) throw new OutOfBoundsError('no previous entry');
    if (!this.isAtLeft()) return this.moveLeft();
    this._n    -= 1;
    this._k     = this._n;
    this._value = this.numeric.one;
    return this;
  }

  /**
   * Step forward in reading order: right, or from the right edge to the
   * first entry of the row below (whose value is 1).
   */
  moveNext(): this {
    if (!this.isAtRight()) return this.moveRight();
    this._n    += 1;
    this._k     = 0;
    this._value = this.numeric.one;
    return this;
  }

  // ── Movement (copying) ─────────────────────────────────────────────────────

  up(): Entry<T>        { return this.copy().moveUp(); }
  down(): Entry<T>      { return this.copy().moveDown(); }
  left(): Entry<T>      { return this.copy().moveLeft(); }
  right(): Entry<T>     { return this.copy().moveRight(); }
  upLeft(): Entry<T>    { return this.copy().moveUpLeft(); }
  downRight(): Entry<T> { return this.copy().moveDownRight(); }
  mirror(): Entry<T>    { return this.copy().moveMirror(); }
  prev(): Entry<T>      { return this.copy().movePrev(); }
  next(): Entry<T>      { return this.copy().moveNext(); }

  // ── Arithmetic ─────────────────────────────────────────────────────────────

  /**
   * Pascal's rule: two adjacent entries of row n sum to the entry directly
   * beneath them, (n+1, max(k_a, k_b)).
   *
   * @throws NonAdjacentError unless the entries are adjacent on one row.
   */
  plus(other: Entry<T>): Entry<T> {
    if (!isAdjacent(this, other)) throw new NonAdjacentError();
    return new Entry(
      this._n + 1,
      Math.max(this._k, other._k),
      this.numeric.add(this._value, other._value),
      this.numeric,
    );
  }

  /**
   * Pascal's rule rearranged: an interior entry minus one of the two entries
   * above it gives the other one, at (n_b, 2k_a - k_b - 1).
   *
   * @throws NonAdjacentError unless isSubtractable(this, other).
   */
  minus(other: Entry<T>): Entry<T> {
    if (!isSubtractable(this, other)) throw new NonAdjacentError();
    return new Entry(
      other._n,
      2 * this._k - other._k - 1,
      this.numeric.sub(this._value, other._value),
      this.numeric,
    );
  }

  // ── Comparison ─────────────────────────────────────────────────────────────

  /** Same position and the same value, whatever the numeric types. */
  equals(other: Entry<NumericValue>): boolean {
    return this._n === other.rowNumber &&
      this._k === other.rowPosition &&
      valuesEqual(this._value, other.value);
  }

  /** Same position and approximately the same value. */
  approxEquals(other: Entry<NumericValue>): boolean {
    return this._n === other.rowNumber &&
      this._k === other.rowPosition &&
      valuesApproxEqual(this._value, other.value);
  }

  /**
   * Orders by value alone; the position is ignored. Two entries can compare
   * as 0 without being equal.
   */
  compare(other: Entry<NumericValue>): number {
    return compareValues(this._value, other.value);
  }

  toString(): string {
    return `(${this._n}, ${this._k}, ${this._value})`;
  }
}

function binomialEntry<T extends NumericValue>(n: number, k: number, numeric: Numeric<T>): Entry<T> {
  assertCoordinates(n, k);
  return new Entry(n, k, numeric.fromBigInt(binomial(n, k)), numeric);
}

// ─── Pair predicates ──────────────────────────────────────────────────────────

/** Same row, positions one apart. */
export function isAdjacent(a: Entry<NumericValue>, b: Entry<NumericValue>): boolean {
  return a.rowNumber === b.rowNumber && Math.abs(a.rowPosition - b.rowPosition) === 1;
}

/**
 * `a` is interior and sits one row below `b`, with b directly above-left
 * (k_a - k_b = 1) or directly above-right (k_a - k_b = 0) of it.
 */
export function isSubtractable(a: Entry<NumericValue>, b: Entry<NumericValue>): boolean {
  const dk = a.rowPosition - b.rowPosition;
  return a.rowNumber === b.rowNumber + 1 && a.isInterior() && 0 <= dk && dk <= 1;
}

export const areAdjacent    = isAdjacent;
export const areSubtractable = isSubtractable;
