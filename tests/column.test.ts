/**
 * pascals-triangle — Column and LazyColumn
 */

import { describe, it, expect } from 'vitest';
import {
  Column,
  DomainError,
  EXACT,
  FLOAT,
  LazyColumn,
  OutOfBoundsError,
  binomial,
} from '../src/index';

// ─── Column ──────────────────────────────────────────────────────────────────

describe('Column', () => {
  it('computes the first values of a column', () => {
    expect(Column.of(4, 5).values()).toEqual([1n, 5n, 15n, 35n, 70n]);
    expect(Column.of(5, 4).values()).toEqual([1n, 6n, 21n, 56n]);
    expect(Column.of(0, 4, FLOAT).values()).toEqual([1, 1, 1, 1]);
  });

  it('indexes by absolute row number', () => {
    const col = Column.of(4, 5);
    expect(col.firstIndex).toBe(4);
    expect(col.lastIndex).toBe(8);
    expect(col.size).toBe(5);
    expect(col.get(6)).toBe(15n);
    expect(() => col.get(3)).toThrow(RangeError);
    expect(() => col.get(9)).toThrow(RangeError);
  });

  it('agrees with the binomial formula', () => {
    for (let c = 0; c <= 8; c++) {
      const col = Column.of(c, 12);
      for (let i = c; i < c + 12; i++) expect(col.get(i)).toBe(binomial(i, c));
    }
  });

  it('iterates and converts to entries', () => {
    expect([...Column.of(2, 3)]).toEqual([1n, 3n, 6n]);
    const entries = Column.of(2, 3).toArray();
    expect(entries.map((e) => [e.rowNumber, e.rowPosition])).toEqual([[2, 2], [3, 2], [4, 2]]);
  });

  it('moves right and left in place', () => {
    const col = Column.of(4, 5);
    expect(col.moveNext()).toBe(col);
    expect(col.values()).toEqual([1n, 6n, 21n, 56n, 126n]);
    col.moveLeft();
    expect(col.equals(Column.of(4, 5))).toBe(true);
  });

  it('moves through copies', () => {
    expect(Column.of(4, 5).next().equals(Column.of(5, 5))).toBe(true);
    expect(Column.of(5, 4).prev().equals(Column.of(4, 4))).toBe(true);
    expect(Column.of(3, 6).right().left().equals(Column.of(3, 6))).toBe(true);
  });

  it('copies its values deeply', () => {
    const col  = Column.of(3, 6);
    const copy = col.copy();
    copy.moveNext().moveNext();
    expect(copy.values()).toEqual([1n, 6n, 21n, 56n, 126n, 252n]);
    expect(col.values()).toEqual([1n, 4n, 10n, 20n, 35n, 56n]);
  });

  it('keeps its values after a failed move', () => {
    const first = Column.of(0, 4);
    expect(() => first.movePrev()).toThrow(OutOfBoundsError);
    expect(first.colNumber).toBe(0);
    expect(first.values()).toEqual([1n, 1n, 1n, 1n]);
  });

  it('has no column left of column 0', () => {
    const first = Column.of(0, 3);
    expect(first.isFirst()).toBe(true);
    expect(first.isAtLeft()).toBe(true);
    expect(() => first.prev()).toThrow(OutOfBoundsError);
    expect(() => first.prev()).toThrow('no previous column');
  });

  it('checks its values', () => {
    expect(new Column(2, [1n, 3n, 7n], EXACT).isValid()).toBe(false);
    expect(new Column(2, [1n, 3n, 6n], EXACT).isValid()).toBe(true);
    expect(() => new Column(-1, [], EXACT)).toThrow(DomainError);
  });

  it('equates columns across numeric types', () => {
    expect(Column.of(3, 10, FLOAT).equals(Column.of(3, 10))).toBe(true);
    expect(Column.of(3, 10).equals(Column.of(3, 9))).toBe(false);
  });
});

// ─── LazyColumn ──────────────────────────────────────────────────────────────

describe('LazyColumn', () => {
  it('starts with only its first value', () => {
    const lazy = LazyColumn.of(4);
    expect(lazy.cachedCount).toBe(1);
    expect(lazy.firstIndex).toBe(4);
  });

  it('fills a neighbourhood around a miss', () => {
    const lazy = LazyColumn.of(4);
    expect(lazy.get(8)).toBe(70n);
    // offsets 2..4 above, 6..10 below, plus the seed and the hit
    expect(lazy.cachedCount).toBe(10);
    expect(lazy.isValid()).toBe(true);
  });

  it('reads the first values', () => {
    expect(LazyColumn.of(4).values(5)).toEqual([1n, 5n, 15n, 35n, 70n]);
    expect(LazyColumn.of(4, FLOAT).values(3)).toEqual([1, 5, 15]);
  });

  it('agrees with Column on overlapping rows', () => {
    for (const c of [0, 1, 3, 7]) {
      const lazy = LazyColumn.of(c);
      lazy.values(20);
      const entries = lazy.toArray().slice(0, 20);
      const eager   = Column.of(c, 20).toArray();
      expect(entries.every((e, j) => e.equals(eager[j]!))).toBe(true);
    }
  });

  it('converts to and from Column', () => {
    const lazy = LazyColumn.of(3);
    lazy.get(5);
    // offsets 1..8 are cached
    expect(Column.fromLazy(lazy).equals(Column.of(3, 8))).toBe(true);
    expect(LazyColumn.fromColumn(Column.of(3, 8)).cachedCount).toBe(8);
    expect(LazyColumn.fromColumn(Column.of(3, 8)).get(10)).toBe(120n);
  });

  it('moves every cached value', () => {
    const lazy = LazyColumn.of(5);
    lazy.values(10);
    const other = LazyColumn.of(6);
    other.values(10);
    expect(lazy.next().equals(other)).toBe(true);
    expect(other.prev().equals(lazy)).toBe(true);
    expect(LazyColumn.of(9).prev().equals(LazyColumn.of(8))).toBe(true);
    expect(LazyColumn.of(9).left().right().equals(LazyColumn.of(9))).toBe(true);
  });

  it('has no column left of column 0', () => {
    expect(() => LazyColumn.of(0).prev()).toThrow(OutOfBoundsError);
  });

  it('keeps its cache after a failed move', () => {
    const lazy = LazyColumn.of(0);
    lazy.values(6);
    // offsets 1..7 are cached
    expect(() => lazy.movePrev()).toThrow(OutOfBoundsError);
    expect(lazy.colNumber).toBe(0);
    expect(lazy.cachedCount).toBe(7);
    expect(lazy.values(6)).toEqual([1n, 1n, 1n, 1n, 1n, 1n]);
    expect(lazy.isValid()).toBe(true);
  });

  it('copies its cache deeply', () => {
    const lazy = LazyColumn.of(2);
    lazy.values(4);
    const copy = lazy.copy();
    copy.moveNext();
    copy.get(30);
    expect(lazy.colNumber).toBe(2);
    expect(lazy.values(4)).toEqual([1n, 3n, 6n, 10n]);
    expect(lazy.isValid()).toBe(true);
  });

  it('rejects rows above the column and bad offsets', () => {
    expect(() => LazyColumn.of(4).get(3)).toThrow(RangeError);
    expect(() => new LazyColumn(2, [[0, 1n]], EXACT)).toThrow(DomainError);
  });

  it('compares cache contents', () => {
    const a = LazyColumn.of(2);
    const b = LazyColumn.of(2);
    expect(a.equals(b)).toBe(true);
    a.get(20);
    expect(a.equals(b)).toBe(false);
  });

  it('flags a wrong cached value', () => {
    expect(new LazyColumn(2, [[1, 1n], [2, 4n]], EXACT).isValid()).toBe(false);
  });
});
