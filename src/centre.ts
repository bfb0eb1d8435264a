/**
 * pascals-triangle — Centre and LazyCentre
 *
 * The central value of every row, indexed by row number: centre.get(n) is
 * C(n, ⌊n/2⌋). Even rows have one middle value; odd rows have two equal ones
 * and the left is taken.
 *
 *   n:      0  1  2  3  4   5   6   7
 *   value:  1  1  2  3  6  10  20  35
 *
 * Centre      dense array for rows 0..maxRow, computed eagerly.
 * LazyCentre  sparse Map from row number to value, seeded with rows 0 and 1
 *             and filled on demand with the same neighbourhood policy as
 *             LazyColumn.
 *
 * `Center` and `LazyCenter` are aliases.
 */

import { PRECALC_NUMBER } from './constants';
import { Entry } from './entry';
import { DomainError, assertNonNegative } from './errors';
import { EXACT, binomial, valuesEqual } from './numeric';
import { ZeroRange } from './range';
import type { Numeric, NumericValue } from './types';

// ─── Central steps ────────────────────────────────────────────────────────────

/**
 * (n, ⌊n/2⌋) → (n+1, ⌊(n+1)/2⌋).
 *
 * From an even row the centre stays at the same position, a plain `down`.
 * From an odd row it shifts one right: downRight, whose ratio (n+1)/(k+1) is
 * exactly 2 when k = (n-1)/2.
 */
function stepDown<T extends NumericValue>(e: Entry<T>): void {
  if (e.rowNumber % 2 === 0) e.moveDown();
  else e.moveDownRight();
}

/**
 * (n, ⌊n/2⌋) → (n-1, ⌊(n-1)/2⌋).
 *
 * A plain `up`; when the new row is odd the position lands one right of the
 * centre, on the mirror of the left-hand middle value, so it is reflected.
 */
function stepUp<T extends NumericValue>(e: Entry<T>): void {
  e.moveUp();
  if (e.rowNumber % 2 === 1) e.moveMirror();
}

function centralEntries<T extends NumericValue>(
  rows: Iterable<readonly [number, T]>,
  numeric: Numeric<T>,
  leftBias: boolean,
): Entry<T>[] {
  const out: Entry<T>[] = [];
  for (const [n, v] of rows) {
    const k = leftBias ? Math.floor(n / 2) : Math.ceil(n / 2);
    out.push(new Entry(n, k, v, numeric));
  }
  return out;
}

// ─── Centre ───────────────────────────────────────────────────────────────────

export class Centre<T extends NumericValue> implements Iterable<T> {
  private readonly _data: T[];

  /** Central values from explicit data, `data[n]` for row n. Unchecked; copied. */
  constructor(data: readonly T[], readonly numeric: Numeric<T>) {
    this._data = data.slice();
  }

  /** Central values of rows 0..maxRow. */
  static of(maxRow: number): Centre<bigint>;
  static of<T extends NumericValue>(maxRow: number, numeric: Numeric<T>): Centre<T>;
  static of<T extends NumericValue>(
    maxRow: number,
    numeric?: Numeric<T>,
  ): Centre<T> | Centre<bigint> {
    return numeric === undefined
      ? computeCentre(maxRow, EXACT)
      : computeCentre(maxRow, numeric);
  }

  /** The contiguous cached run of `lazy` from row 0. */
  static fromLazy<T extends NumericValue>(lazy: LazyCentre<T>): Centre<T> {
    return new Centre(lazy.cachedRun(), lazy.numeric);
  }

  copy(): Centre<T> {
    return new Centre(this._data, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get size(): number {
    return this._data.length;
  }

  get firstIndex(): number {
    return 0;
  }

  get lastIndex(): number {
    return this._data.length - 1;
  }

  /** @throws DomainError when the centre holds no rows. */
  get axes(): ZeroRange {
    if (this._data.length === 0) throw new DomainError('an empty Centre has no axes.');
    return new ZeroRange(this._data.length - 1);
  }

  /**
   * C(i, ⌊i/2⌋).
   *
   * @throws RangeError unless 0 ≤ i ≤ lastIndex.
   */
  get(i: number): T {
    if (!Number.isInteger(i) || i < 0 || i >= this._data.length) {
      throw new RangeError(`Centre index ${i} out of range 0..${this.lastIndex}.`);
    }
    return this._data[i]!;
  }

  values(): T[] {
    return this._data.slice();
  }

  [Symbol.iterator](): Iterator<T> {
    return this._data.values();
  }

  // ── Checks ─────────────────────────────────────────────────────────────────

  equals(other: Centre<NumericValue>): boolean {
    if (this._data.length !== other._data.length) return false;
    return this._data.every((v, n) => valuesEqual(v, other._data[n]!));
  }

  isValid(): boolean {
    return this._data.every((v, n) => this.numeric.toExact(v) === binomial(n, Math.floor(n / 2)));
  }

  // ── Conversion ─────────────────────────────────────────────────────────────

  /**
   * One entry per row. The position is ⌊n/2⌋, or ⌈n/2⌉ when `leftBias` is
   * false; by symmetry both hold the same value.
   */
  toArray(leftBias = true): Entry<T>[] {
    return centralEntries(this._data.entries(), this.numeric, leftBias);
  }
}

function computeCentre<T extends NumericValue>(maxRow: number, numeric: Numeric<T>): Centre<T> {
  assertNonNegative('maxRow', maxRow);
  const entry = new Entry(0, 0, numeric.one, numeric);
  const data: T[] = [entry.value];
  for (let n = 1; n <= maxRow; n++) {
    stepDown(entry);
    data.push(entry.value);
  }
  return new Centre(data, numeric);
}

// ─── LazyCentre ───────────────────────────────────────────────────────────────

/**
 * Central values computed on first read and cached forever. Like LazyColumn,
 * reads mutate the cache and equality compares cache contents.
 */
export class LazyCentre<T extends NumericValue> {
  private readonly _cache: Map<number, T>;

  /** A lazy centre from explicit (row, value) pairs. Unchecked. */
  constructor(cache: Iterable<readonly [number, T]>, readonly numeric: Numeric<T>) {
    this._cache = new Map();
    for (const [n, value] of cache) {
      assertNonNegative('LazyCentre row', n);
      this._cache.set(n, value);
    }
  }

  /** Seeded with rows 0 and 1, both 1. */
  static of(): LazyCentre<bigint>;
  static of<T extends NumericValue>(numeric: Numeric<T>): LazyCentre<T>;
  static of<T extends NumericValue>(numeric?: Numeric<T>): LazyCentre<T> | LazyCentre<bigint> {
    return numeric === undefined
      ? new LazyCentre([[0, EXACT.one], [1, EXACT.one]], EXACT)
      : new LazyCentre([[0, numeric.one], [1, numeric.one]], numeric);
  }

  static fromCentre<T extends NumericValue>(centre: Centre<T>): LazyCentre<T> {
    return new LazyCentre(centre.values().entries(), centre.numeric);
  }

  copy(): LazyCentre<T> {
    return new LazyCentre(this._cache, this.numeric);
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get firstIndex(): number {
    return 0;
  }

  get cachedCount(): number {
    return this._cache.size;
  }

  /**
   * C(i, ⌊i/2⌋). A miss computes the value directly, then walks up to
   * PRECALC_NUMBER rows above (stopping at row 2) and below, caching each.
   *
   * @throws RangeError unless i is a non-negative integer.
   */
  get(i: number): T {
    if (!Number.isInteger(i) || i < 0) {
      throw new RangeError(`LazyCentre index ${i} out of range 0..∞.`);
    }
    const hit = this._cache.get(i);
    if (hit !== undefined) return hit;

    const entry = Entry.of(i, Math.floor(i / 2), this.numeric);
    this._cache.set(i, entry.value);

    const above = entry.copy();
    for (let j = i - 1; j >= Math.max(2, i - PRECALC_NUMBER); j--) {
      stepUp(above);
      if (!this._cache.has(j)) this._cache.set(j, above.value);
    }

    const below = entry.copy();
    for (let j = i + 1; j <= i + PRECALC_NUMBER; j++) {
      stepDown(below);
      if (!this._cache.has(j)) this._cache.set(j, below.value);
    }

    return entry.value;
  }

  /** Rows 0..count-1, computing any that are missing. */
  values(count: number): T[] {
    assertNonNegative('count', count);
    const out: T[] = [];
    for (let n = 0; n < count; n++) out.push(this.get(n));
    return out;
  }

  /** @internal Cached values from row 0 up to the first gap. */
  cachedRun(): T[] {
    const out: T[] = [];
    for (let n = 0; ; n++) {
      const v = this._cache.get(n);
      if (v === undefined) return out;
      out.push(v);
    }
  }

  // ── Checks ─────────────────────────────────────────────────────────────────

  equals(other: LazyCentre<NumericValue>): boolean {
    if (this._cache.size !== other._cache.size) return false;
    for (const [n, v] of this._cache) {
      const w = other._cache.get(n);
      if (w === undefined || !valuesEqual(v, w)) return false;
    }
    return true;
  }

  isValid(): boolean {
    for (const [n, v] of this._cache) {
      if (this.numeric.toExact(v) !== binomial(n, Math.floor(n / 2))) return false;
    }
    return true;
  }

  // ── Conversion ─────────────────────────────────────────────────────────────

  /** Cached entries in row order; see Centre.toArray for `leftBias`. */
  toArray(leftBias = true): Entry<T>[] {
    const rows = [...this._cache].sort(([a], [b]) => a - b);
    return centralEntries(rows, this.numeric, leftBias);
  }
}

// ─── Aliases ──────────────────────────────────────────────────────────────────

export { Centre as Center, LazyCentre as LazyCenter };
