/**
 * pascals-triangle — numeric backends
 *
 * EXACT (bigint) and FLOAT (number) implementations of Numeric, the exact
 * binomial coefficient, and cross-type value comparison.
 *
 * EXACT is the default everywhere a Numeric argument is optional.
 */

import { FLOAT_RTOL } from './constants';
import type { Numeric, NumericValue } from './types';

// ─── Backends ─────────────────────────────────────────────────────────────────

/**
 * Exact integer arithmetic on bigint.
 *
 * `div` truncates. Movement rules always multiply before they divide, and the
 * product is a multiple of the divisor by the binomial ratio identities, so
 * truncation never discards anything.
 */
export const EXACT: Numeric<bigint> = {
  zero: 0n,
  one:  1n,

  fromInt:    (i) => BigInt(i),
  fromBigInt: (b) => b,
  toExact:    (v) => v,

  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
};

/**
 * IEEE-754 double arithmetic. Values stay exact up to Number.MAX_SAFE_INTEGER
 * and lose low-order digits beyond it (C(57, 28) is the first central value
 * past 2^53).
 */
export const FLOAT: Numeric<number> = {
  zero: 0,
  one:  1,

  fromInt:    (i) => i,
  fromBigInt: (b) => Number(b),
  toExact:    (v) => (Number.isInteger(v) ? BigInt(v) : null),

  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
};

// ─── Binomial ─────────────────────────────────────────────────────────────────

/**
 * Exact binomial coefficient C(n, k). Returns 0n outside 0 ≤ k ≤ n.
 *
 * Runs the multiplicative formula over min(k, n - k) steps; after step i the
 * accumulator is C(n - k + i, i), so every division is exact.
 */
export function binomial(n: number, k: number): bigint {
  if (k < 0 || k > n) return 0n;
  const m   = Math.min(k, n - k);
  const top = BigInt(n - m);
  let acc   = 1n;
  for (let i = 1n; i <= BigInt(m); i++) {
    acc = (acc * (top + i)) / i;
  }
  return acc;
}

// ─── Cross-type comparison ────────────────────────────────────────────────────

/**
 * Value equality across numeric types. A number equals a bigint only when it
 * is an integer of the same magnitude: 6 equals 6n, 6.5 equals nothing integral.
 */
export function valuesEqual(a: NumericValue, b: NumericValue): boolean {
  if (typeof a === 'number') {
    return typeof b === 'number' ? a === b : sameInteger(a, b);
  }
  return typeof b === 'bigint' ? a === b : sameInteger(b, a);
}

function sameInteger(num: number, big: bigint): boolean {
  return Number.isInteger(num) && BigInt(num) === big;
}

/**
 * Approximate value equality: |a - b| ≤ FLOAT_RTOL·max(|a|, |b|).
 * Two bigints compare exactly.
 */
export function valuesApproxEqual(a: NumericValue, b: NumericValue): boolean {
  if (typeof a === 'bigint' && typeof b === 'bigint') return a === b;
  if (valuesEqual(a, b)) return true;
  const x = Number(a);
  const y = Number(b);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return false;
  return Math.abs(x - y) <= FLOAT_RTOL * Math.max(Math.abs(x), Math.abs(y));
}

/**
 * Three-way value comparison. The relational operators already compare a
 * bigint with a number by mathematical value, so no conversion is needed.
 */
export function compareValues(a: NumericValue, b: NumericValue): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
