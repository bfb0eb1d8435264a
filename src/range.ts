/**
 * pascals-triangle — ZeroRange
 *
 * The integer interval [0, max], used as the index domain of a Row (indices
 * 0..n) and of a Centre (rows 0..maxRow).
 */

import { assertNonNegative } from './errors';

export class ZeroRange implements Iterable<number> {
  readonly max: number;

  constructor(max: number) {
    assertNonNegative('ZeroRange end', max);
    this.max = max;
  }

  get length(): number {
    return this.max + 1;
  }

  get first(): number {
    return 0;
  }

  get last(): number {
    return this.max;
  }

  /** The i-th element of the range, which is i itself. */
  get(i: number): number {
    if (!this.includes(i)) {
      throw new RangeError(`ZeroRange index ${i} out of range 0..${this.max}.`);
    }
    return i;
  }

  includes(i: number): boolean {
    return Number.isInteger(i) && 0 <= i && i <= this.max;
  }

  equals(other: ZeroRange): boolean {
    return this.max === other.max;
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i <= this.max; i++) yield i;
  }

  toString(): string {
    return `ZeroRange(${this.max})`;
  }
}
