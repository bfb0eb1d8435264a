/**
 * pascals-triangle — Column and LazyColumn
 *
 * A column is the vertical run C(c, c), C(c+1, c), C(c+2, c), … for a fixed
 * position c. Both variants index by absolute row number: column.get(i) is
 * C(i, c), valid from i = c upward.
 *
 * Column      dense array of the first `size` values, computed eagerly by
 *             moving down from (c, c).
 * LazyColumn  sparse Map from 1-based offset (row c + offset - 1) to value,
 *             unbounded, filled on demand. A miss computes the requested
 *             value directly and then fills up to PRECALC_NUMBER neighbours
 *             on each side by movement.
 *
 * Moving a column right or left (to c+1 or c-1) rewrites every stored value
 * in place; no binomial is recomputed.
 */

import { PRECALC_NUMBER } from './constants';
import { Entry } from './entry';
import { DomainError, OutOfBoundsError, assertInteger, assertNonNegative } from './errors';
import { downRightValue, upLeftValue } from './movement';
import { EXACT, binomial, valuesEqual } from './numeric';
import type { Numeric, NumericValue } from './types';

// ─── Column ───────────────────────────────────────────────────────────────────

export class Column<T extends NumericValue> implements Iterable<T> {
  private _colNumber: number;
  private readonly _data: T[];

  /**
   * A column from explicit values, `data[j]` = C(colNumber + j, colNumber).
   * Values are not checked. `data` is copied.
   */
  constructor(colNumber: number, data: readonly T[], readonly numeric: Numeric<T>) {
    assertNonNegative('colNumber', colNumber);
    this._colNumber = colNumber;
    this._data      = data.slice();
  }

  /** The first `size` values of column `colNumber`. */
  static of(colNumber: number, size: number): Column<bigint>;
  static of<T extends NumericValue>(colNumber: number, size: number, numeric: Numeric<T>): Column<T>;
  static of<T extends NumericValue>(
    colNumber: number,
    size: number,
    numeric?: Numeric<T>,
  ): Column<T> | Column<bigint> {
    return numeric === undefined
      ? computeColumn(colNumber, size, EXACT)
      : computeColumn(colNumber, size, numeric);
  }

  /** The contiguous cached run of `lazy` starting at its first row. */
  static fromLazy<T extends NumericValue>(lazy: LazyColumn<T>): Column<T> {
    return new Column(lazy.colNumber, lazy.cachedRun(), lazy.numeric);
  }

  copy(): Column<T> {
    return new Column(this._colNumber, this._data, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get colNumber(): number {
    return this._colNumber;
  }

  get size(): number {
    return this._data.length;
  }

  /** First valid row: the column number itself. */
  get firstIndex(): number {
    return this._colNumber;
  }

  get lastIndex(): number {
    return this._colNumber + this._data.length - 1;
  }

  /**
   * C(i, colNumber).
   *
   * @throws RangeError unless firstIndex ≤ i ≤ lastIndex.
   */
  get(i: number): T {
    if (!Number.isInteger(i) || i < this.firstIndex || i > this.lastIndex) {
      throw new RangeError(
        `Column ${this._colNumber} index ${i} out of range ${this.firstIndex}..${this.lastIndex}.`,
      );
    }
    return this._data[i - this._colNumber]!;
  }

  values(): T[] {
    return this._data.slice();
  }

  [Symbol.iterator](): Iterator<T> {
    return this._data.values();
  }

  // ── Movement (in place) ────────────────────────────────────────────────────

  /** To column c+1: C(c+1+j, c+1) = C(c+j, c+1) + C(c+j, c), bottom-up. */
  moveNext(): this {
    const data = this._data;
    for (let j = 1; j < data.length; j++) {
      data[j] = this.numeric.add(data[j]!, data[j - 1]!);
    }
    this._colNumber += 1;
    return this;
  }

  /** To column c-1: the inverse recurrence, top-down. */
  movePrev(): this {
    if (this.isFirst()) throw new OutOfBoundsError('no previous column');
    const data = this._data;
    for (let j = data.length - 1; j >= 1; j--) {
      data[j] = this.numeric.sub(data[j]!, data[j - 1]!);
    }
    this._colNumber -= 1;
    return this;
  }

  moveRight(): this { return this.moveNext(); }
  moveLeft(): this  { return this.movePrev(); }

  // ── Movement (copying) ─────────────────────────────────────────────────────

  next(): Column<T>  { return this.copy().moveNext(); }
  prev(): Column<T>  { return this.copy().movePrev(); }
  right(): Column<T> { return this.copy().moveNext(); }
  left(): Column<T>  { return this.copy().movePrev(); }

  // ── Checks ─────────────────────────────────────────────────────────────────

  isFirst(): boolean {
    return this._colNumber === 0;
  }

  isAtLeft(): boolean {
    return this.isFirst();
  }

  equals(other: Column<NumericValue>): boolean {
    if (this._colNumber !== other._colNumber) return false;
    if (this._data.length !== other._data.length) return false;
    return this._data.every((v, j) => valuesEqual(v, other._data[j]!));
  }

  isValid(): boolean {
    const c = this._colNumber;
    return this._data.every((v, j) => this.numeric.toExact(v) === binomial(c + j, c));
  }

  // ── Conversion ─────────────────────────────────────────────────────────────

  toArray(): Entry<T>[] {
    const c = this._colNumber;
    return this._data.map((v, j) => new Entry(c + j, c, v, this.numeric));
  }
}

function computeColumn<T extends NumericValue>(
  colNumber: number,
  size:      number,
  numeric:   Numeric<T>,
): Column<T> {
  assertNonNegative('colNumber', colNumber);
  assertNonNegative('size', size);

  const data: T[] = [];
  if (size > 0) {
    const entry = new Entry(colNumber, colNumber, numeric.one, numeric);
    data.push(entry.value);
    for (let j = 1; j < size; j++) {
      data.push(entry.moveDown().value);
    }
  }
  return new Column(colNumber, data, numeric);
}

// ─── LazyColumn ───────────────────────────────────────────────────────────────

/**
 * Column values computed on first read and cached forever.
 *
 * Reads mutate the cache, so even read-only use of a shared LazyColumn needs
 * external synchronization. Equality compares cache contents, which depend on
 * the reads made so far.
 */
export class LazyColumn<T extends NumericValue> {
  private _colNumber: number;
  private readonly _cache: Map<number, T>;

  /**
   * A lazy column from explicit cached values keyed by 1-based offset
   * (offset j holds C(colNumber + j - 1, colNumber)). Values are not checked.
   */
  constructor(
    colNumber: number,
    cache: Iterable<readonly [number, T]>,
    readonly numeric: Numeric<T>,
  ) {
    assertNonNegative('colNumber', colNumber);
    this._colNumber = colNumber;
    this._cache     = new Map();
    for (const [offset, value] of cache) {
      assertInteger('LazyColumn offset', offset);
      if (offset < 1) {
        throw new DomainError(`LazyColumn offsets start at 1; got ${offset}.`);
      }
      this._cache.set(offset, value);
    }
  }

  /** An empty lazy column, seeded with its first value C(c, c) = 1. */
  static of(colNumber: number): LazyColumn<bigint>;
  static of<T extends NumericValue>(colNumber: number, numeric: Numeric<T>): LazyColumn<T>;
  static of<T extends NumericValue>(
    colNumber: number,
    numeric?: Numeric<T>,
  ): LazyColumn<T> | LazyColumn<bigint> {
    return numeric === undefined
      ? new LazyColumn(colNumber, [[1, EXACT.one]], EXACT)
      : new LazyColumn(colNumber, [[1, numeric.one]], numeric);
  }

  /** Every value of `column`, copied into the cache. */
  static fromColumn<T extends NumericValue>(column: Column<T>): LazyColumn<T> {
    return new LazyColumn(
      column.colNumber,
      column.values().map((v, j): [number, T] => [j + 1, v]),
      column.numeric,
    );
  }

  copy(): LazyColumn<T> {
    return new LazyColumn(this._colNumber, this._cache, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get colNumber(): number {
    return this._colNumber;
  }

  get firstIndex(): number {
    return this._colNumber;
  }

  /** Number of values computed so far. */
  get cachedCount(): number {
    return this._cache.size;
  }

  /**
   * C(i, colNumber). A miss costs one binomial plus up to 2·PRECALC_NUMBER
   * movement steps, and caches all of them.
   *
   * @throws RangeError unless i is an integer ≥ colNumber.
   */
  get(i: number): T {
    if (!Number.isInteger(i) || i < this._colNumber) {
      throw new RangeError(
        `LazyColumn ${this._colNumber} index ${i} out of range ${this._colNumber}..∞.`,
      );
    }
    const offset = i - this._colNumber + 1;
    const hit    = this._cache.get(offset);
    if (hit !== undefined) return hit;

    const entry = Entry.of(i, this._colNumber, this.numeric);
    this._cache.set(offset, entry.value);

    const above = entry.copy();
    for (let j = offset - 1; j >= Math.max(1, offset - PRECALC_NUMBER); j--) {
      above.moveUp();
      if (!this._cache.has(j)) this._cache.set(j, above.value);
    }

    const below = entry.copy();
    for (let j = offset + 1; j <= offset + PRECALC_NUMBER; j++) {
      below.moveDown();
      if (!this._cache.has(j)) this._cache.set(j, below.value);
    }

    return entry.value;
  }

  /** The first `count` values, computing any that are missing. */
  values(count: number): T[] {
    assertNonNegative('count', count);
    const out: T[] = [];
    for (let j = 0; j < count; j++) out.push(this.get(this._colNumber + j));
    return out;
  }

  /** @internal Cached values from offset 1 up to the first gap. */
  cachedRun(): T[] {
    const out: T[] = [];
    for (let j = 1; ; j++) {
      const v = this._cache.get(j);
      if (v === undefined) return out;
      out.push(v);
    }
  }

  // ── Movement (in place) ────────────────────────────────────────────────────
  // Only cached values move; offsets are preserved because both the column
  // and its rows shift by one.

  /** Every cached (n, c) becomes (n+1, c+1). */
  moveNext(): this {
    const c = this._colNumber;
    for (const [offset, v] of this._cache) {
      this._cache.set(offset, downRightValue(this.numeric, c + offset - 1, c, v));
    }
    this._colNumber = c + 1;
    return this;
  }

  /** Every cached (n, c) becomes (n-1, c-1). */
  movePrev(): this {
    if (this.isFirst()) throw new OutOfBoundsError('no previous column');
    const c = this._colNumber;
    for (const [offset, v] of this._cache) {
      this._cache.set(offset, upLeftValue(this.numeric, c + offset - 1, c, v));
    }
    this._colNumber = c - 1;
    return this;
  }

  moveRight(): this { return this.moveNext(); }
  moveLeft(): this  { return this.movePrev(); }

  // ── Movement (copying) ─────────────────────────────────────────────────────

  next(): LazyColumn<T>  { return this.copy().moveNext(); }
  prev(): LazyColumn<T>  { return this.copy().movePrev(); }
  right(): LazyColumn<T> { return this.copy().moveNext(); }
  left(): LazyColumn<T>  { return this.copy().movePrev(); }

  // ── Checks ─────────────────────────────────────────────────────────────────

  isFirst(): boolean {
    return this._colNumber === 0;
  }

  isAtLeft(): boolean {
    return this.isFirst();
  }

  /** Same column and the same cached offsets holding equal values. */
  equals(other: LazyColumn<NumericValue>): boolean {
    if (this._colNumber !== other._colNumber) return false;
    if (this._cache.size !== other._cache.size) return false;
    for (const [offset, v] of this._cache) {
      const w = other._cache.get(offset);
      if (w === undefined || !valuesEqual(v, w)) return false;
    }
    return true;
  }

  /** Every cached value checked against the exact binomial. */
  isValid(): boolean {
    const c = this._colNumber;
    for (const [offset, v] of this._cache) {
      if (this.numeric.toExact(v) !== binomial(c + offset - 1, c)) return false;
    }
    return true;
  }

  // ── Conversion ─────────────────────────────────────────────────────────────

  /** Cached entries in row order. Uncached rows are skipped, not computed. */
  toArray(): Entry<T>[] {
    const c = this._colNumber;
    return [...this._cache]
      .sort(([a], [b]) => a - b)
      .map(([offset, v]) => new Entry(c + offset - 1, c, v, this.numeric));
  }
}
