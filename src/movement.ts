/**
 * pascals-triangle — movement algebra
 *
 * The value of a neighbouring entry from a known entry (n, k, v = C(n, k)),
 * by one ratio of the binomial identities instead of a fresh binomial:
 *
 *   up         (n-1, k)    v·(n-k) / n
 *   down       (n+1, k)    v·(n+1) / (n-k+1)
 *   left       (n, k-1)    v·k     / (n-k+1)
 *   right      (n, k+1)    v·(n-k) / (k+1)
 *   upLeft     (n-1, k-1)  v·k     / n
 *   downRight  (n+1, k+1)  v·(n+1) / (k+1)
 *
 * Division is always the last step. For an exact numeric the product is a
 * multiple of the divisor, so integer division loses nothing; dividing first
 * would truncate.
 *
 * These functions only compute values. Preconditions (edges of the triangle)
 * are checked by the callers that move coordinates: Entry and the containers.
 */

import type { Numeric, NumericValue } from './types';

function ratio<T extends NumericValue>(num: Numeric<T>, v: T, mul: number, div: number): T {
  return num.div(num.mul(v, num.fromInt(mul)), num.fromInt(div));
}

/** C(n-1, k) from v = C(n, k). Requires n > 0 and k < n. */
export function upValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, n - k, n);
}

/** C(n+1, k) from v = C(n, k). */
export function downValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, n + 1, n - k + 1);
}

/** C(n, k-1) from v = C(n, k). Requires k > 0. */
export function leftValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, k, n - k + 1);
}

/** C(n, k+1) from v = C(n, k). Requires k < n. */
export function rightValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, n - k, k + 1);
}

/** C(n-1, k-1) from v = C(n, k). Requires k > 0. */
export function upLeftValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, k, n);
}

/** C(n+1, k+1) from v = C(n, k). */
export function downRightValue<T extends NumericValue>(num: Numeric<T>, n: number, k: number, v: T): T {
  return ratio(num, v, n + 1, k + 1);
}
