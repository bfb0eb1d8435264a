/**
 * pascals-triangle — Entry
 *
 * Construction, the nine movements in both forms, Pascal's-rule arithmetic
 * and comparison. Expected values come from binomial(), which shares no code
 * with the movement path.
 */

import { describe, it, expect } from 'vitest';
import {
  DomainError,
  EXACT,
  Entry,
  FLOAT,
  NonAdjacentError,
  OutOfBoundsError,
  areAdjacent,
  isAdjacent,
  isSubtractable,
} from '../src/index';

// ─── construction ────────────────────────────────────────────────────────────

describe('Entry construction', () => {
  it('computes the value from the binomial formula', () => {
    const e = Entry.of(15, 6);
    expect(e.value).toBe(5005n);
    expect(e.rowNumber).toBe(15);
    expect(e.rowPosition).toBe(6);
  });

  it('builds a float entry when given FLOAT', () => {
    expect(Entry.of(15, 6, FLOAT).value).toBe(5005);
  });

  it('builds from a coordinate pair', () => {
    expect(Entry.fromPair([15, 6]).equals(Entry.of(15, 6))).toBe(true);
    expect(Entry.fromPair([15, 6], FLOAT).value).toBe(5005);
  });

  it('rejects positions outside 0 ≤ k ≤ n', () => {
    expect(() => new Entry(-5, 10, 1n, EXACT)).toThrow(DomainError);
    expect(() => Entry.of(10, -5)).toThrow(DomainError);
    expect(() => Entry.of(15, 20)).toThrow(DomainError);
  });

  it('rejects fractional coordinates', () => {
    expect(() => Entry.of(1.5, 0)).toThrow(TypeError);
  });

  it('accepts a wrong explicit value but reports it invalid', () => {
    const e = new Entry(5, 2, 11n, EXACT);
    expect(e.value).toBe(11n);
    expect(e.isValid()).toBe(false);
    expect(Entry.of(5, 2).isValid()).toBe(true);
  });

  it('prints as (n, k, value)', () => {
    expect(Entry.of(5, 2).toString()).toBe('(5, 2, 10)');
  });
});

// ─── predicates ──────────────────────────────────────────────────────────────

describe('Entry predicates', () => {
  it('recognises the apex and the edges', () => {
    expect(Entry.of(0, 0).isFirst()).toBe(true);
    expect(Entry.of(4, 0).isAtLeft()).toBe(true);
    expect(Entry.of(4, 4).isAtRight()).toBe(true);
    expect(Entry.of(4, 2).isInterior()).toBe(true);
    expect(Entry.of(4, 0).isInterior()).toBe(false);
    expect(Entry.of(1, 0).isInterior()).toBe(false);
  });

  it('tests adjacency and subtractability of pairs', () => {
    expect(isAdjacent(Entry.of(5, 2), Entry.of(5, 3))).toBe(true);
    expect(areAdjacent(Entry.of(5, 3), Entry.of(5, 2))).toBe(true);
    expect(isAdjacent(Entry.of(5, 2), Entry.of(6, 3))).toBe(false);
    expect(isSubtractable(Entry.of(6, 3), Entry.of(5, 3))).toBe(true);
    expect(isSubtractable(Entry.of(6, 3), Entry.of(5, 2))).toBe(true);
    expect(isSubtractable(Entry.of(6, 3), Entry.of(5, 4))).toBe(false);
    expect(isSubtractable(Entry.of(6, 0), Entry.of(5, 0))).toBe(false);
  });
});

// ─── movement ────────────────────────────────────────────────────────────────

describe('Entry movement (copying)', () => {
  const e = Entry.of(30, 11);

  it('moves to each neighbour', () => {
    expect(e.left().equals(Entry.of(30, 10))).toBe(true);
    expect(e.right().equals(Entry.of(30, 12))).toBe(true);
    expect(e.up().equals(Entry.of(29, 11))).toBe(true);
    expect(e.down().equals(Entry.of(31, 11))).toBe(true);
    expect(e.upLeft().equals(Entry.of(29, 10))).toBe(true);
    expect(e.downRight().equals(Entry.of(31, 12))).toBe(true);
    expect(e.mirror().equals(Entry.of(30, 19))).toBe(true);
  });

  it('leaves the receiver unchanged', () => {
    e.right();
    e.down();
    expect(e.equals(Entry.of(30, 11))).toBe(true);
    expect(e.value).toBe(54627300n);
  });

  it('wraps next/prev across row ends', () => {
    expect(Entry.of(20, 20).next().equals(Entry.of(21, 0))).toBe(true);
    expect(Entry.of(21, 0).prev().equals(Entry.of(20, 20))).toBe(true);
    expect(Entry.of(20, 5).next().equals(Entry.of(20, 6))).toBe(true);
  });

  it('round-trips next/prev and down/up', () => {
    for (const [n, k] of [[1, 0], [7, 3], [12, 12], [40, 17]] as const) {
      const x = Entry.of(n, k);
      expect(x.next().prev().equals(x)).toBe(true);
      expect(x.down().up().equals(x)).toBe(true);
      if (n > 0) expect(x.prev().next().equals(x)).toBe(true);
    }
  });

  it('round-trips up/down wherever up is legal', () => {
    for (let n = 1; n < 30; n++) {
      for (let k = 0; k < n; k++) {
        const x = Entry.of(n, k);
        expect(x.up().down().equals(x)).toBe(true);
        expect(x.down().up().equals(x)).toBe(true);
      }
    }
    for (const [n, k] of [[9, 0], [9, 4], [25, 1], [25, 24]] as const) {
      const x = Entry.of(n, k, FLOAT);
      expect(x.up().down().equals(Entry.of(n, k))).toBe(true);
    }
  });

  it('walks a whole row exactly', () => {
    const x = Entry.of(60, 0);
    for (let k = 0; k < 30; k++) x.moveRight();
    expect(x.equals(Entry.of(60, 30))).toBe(true);
  });
});

describe('Entry movement (in place)', () => {
  it('returns the receiver', () => {
    const e = Entry.of(30, 11);
    expect(e.moveDown()).toBe(e);
    expect(e.rowNumber).toBe(31);
    e.moveDown().moveRight();
    expect(e.equals(Entry.of(32, 12))).toBe(true);
  });

  it('mirrors without changing the value', () => {
    const e = Entry.of(10, 3).moveMirror();
    expect(e.rowPosition).toBe(7);
    expect(e.value).toBe(120n);
  });
});

describe('Entry movement errors', () => {
  it('refuses to leave the triangle', () => {
    expect(() => Entry.of(0, 0).up()).toThrow(OutOfBoundsError);
    expect(() => Entry.of(0, 0).prev()).toThrow(OutOfBoundsError);
    expect(() => Entry.of(7, 0).left()).toThrow(OutOfBoundsError);
    expect(() => Entry.of(7, 7).right()).toThrow(OutOfBoundsError);
    expect(() => Entry.of(5, 5).up()).toThrow(OutOfBoundsError);
    expect(() => Entry.of(5, 0).upLeft()).toThrow(OutOfBoundsError);
  });

  it('names the direction in the reason', () => {
    expect(() => Entry.of(0, 0).up()).toThrow('no entry above');
    expect(() => Entry.of(0, 0).prev()).toThrow('no previous entry');
    expect(() => Entry.of(7, 0).left()).toThrow('no entry to the left');
    expect(() => Entry.of(7, 7).right()).toThrow('no entry to the right');
    expect(() => Entry.of(5, 0).upLeft()).toThrow('no entry up and to the left');
  });

  it('leaves the receiver untouched after a failed move', () => {
    const e = Entry.of(7, 7);
    expect(() => e.moveRight()).toThrow(OutOfBoundsError);
    expect(e.equals(Entry.of(7, 7))).toBe(true);
  });
});

// ─── arithmetic ──────────────────────────────────────────────────────────────

describe('Entry arithmetic', () => {
  it('adds adjacent entries into the entry below', () => {
    const sum = Entry.of(5, 2).plus(Entry.of(5, 3));
    expect(sum.equals(Entry.of(6, 3))).toBe(true);
    expect(sum.value).toBe(20n);
  });

  it('refuses to add entries that are not adjacent', () => {
    expect(() => Entry.of(4, 3).plus(Entry.of(5, 1))).toThrow(NonAdjacentError);
    expect(() => Entry.of(5, 1).plus(Entry.of(5, 3))).toThrow(NonAdjacentError);
    expect(() => Entry.of(5, 1).plus(Entry.of(5, 3))).toThrow('entries not appropriately arranged');
  });

  it('subtracts either parent to get the other', () => {
    expect(Entry.of(6, 3).minus(Entry.of(5, 3)).equals(Entry.of(5, 2))).toBe(true);
    expect(Entry.of(6, 3).minus(Entry.of(5, 2)).equals(Entry.of(5, 3))).toBe(true);
  });

  it('refuses to subtract entries that are not arranged', () => {
    expect(() => Entry.of(4, 1).minus(Entry.of(7, 3))).toThrow(NonAdjacentError);
  });
});

// ─── comparison ──────────────────────────────────────────────────────────────

describe('Entry comparison', () => {
  it('equates float and exact entries of the same value', () => {
    expect(Entry.of(10, 3, FLOAT).equals(Entry.of(10, 3))).toBe(true);
    expect(new Entry(10, 3, 120.5, FLOAT).equals(Entry.of(10, 3))).toBe(false);
  });

  it('approximately equates large float values', () => {
    const walked = Entry.of(50, 0, FLOAT);
    for (let k = 0; k < 25; k++) walked.moveRight();
    expect(walked.approxEquals(Entry.of(50, 25))).toBe(true);
  });

  it('orders by value alone', () => {
    expect(Entry.of(10, 3).compare(Entry.of(16, 2))).toBe(0);
    expect(Entry.of(10, 2).compare(Entry.of(10, 3))).toBe(-1);
    expect(Entry.of(10, 3).equals(Entry.of(16, 2))).toBe(false);
  });
});
