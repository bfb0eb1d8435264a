/**
 * pascals-triangle — type definitions
 *
 * Every container in this package is generic over the numeric type of its
 * values. Coordinates (row number n, row position k, column number) are always
 * plain integers; only the values vary.
 */

// ─── Numeric Values ───────────────────────────────────────────────────────────

/**
 * The value types a triangle entry may hold.
 *
 * bigint:  exact integers of unbounded size. Movement arithmetic divides last,
 *          so every intermediate product is exactly divisible.
 * number:  IEEE-754 doubles. Exact up to 2^53, approximate beyond.
 */
export type NumericValue = number | bigint;

/**
 * Arithmetic over one NumericValue type.
 *
 * Containers never use the JS operators on their values directly; they go
 * through a Numeric so that the same algorithm runs over bigint and number.
 */
export interface Numeric<T extends NumericValue> {
  readonly zero: T;
  readonly one:  T;

  fromInt(i: number): T;
  fromBigInt(b: bigint): T;

  /**
   * The exact integer a value represents, or null when it is not an integer
   * (a non-integral or non-finite double). Used by every validity check.
   */
  toExact(v: T): bigint | null;

  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
}

// ─── Coordinates ──────────────────────────────────────────────────────────────

/** Coordinates of a triangle entry, as [rowNumber, rowPosition]. */
export type Coordinates = readonly [n: number, k: number];
