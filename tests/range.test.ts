/**
 * pascals-triangle — ZeroRange
 *
 * The index domain 0..max shared by Row and Centre.
 */

import { describe, it, expect } from 'vitest';
import { DomainError, ZeroRange } from '../src/index';

describe('ZeroRange', () => {
  it('covers 0..max inclusive', () => {
    const r = new ZeroRange(4);
    expect(r.length).toBe(5);
    expect(r.first).toBe(0);
    expect(r.last).toBe(4);
    expect([...r]).toEqual([0, 1, 2, 3, 4]);
  });

  it('holds a single element when max is 0', () => {
    expect([...new ZeroRange(0)]).toEqual([0]);
  });

  it('indexes to itself', () => {
    const r = new ZeroRange(4);
    expect(r.get(3)).toBe(3);
    expect(() => r.get(5)).toThrow(RangeError);
    expect(() => r.get(-1)).toThrow(RangeError);
  });

  it('includes only integers in range', () => {
    const r = new ZeroRange(4);
    expect(r.includes(0)).toBe(true);
    expect(r.includes(4)).toBe(true);
    expect(r.includes(-1)).toBe(false);
    expect(r.includes(2.5)).toBe(false);
  });

  it('compares by end point', () => {
    expect(new ZeroRange(3).equals(new ZeroRange(3))).toBe(true);
    expect(new ZeroRange(3).equals(new ZeroRange(4))).toBe(false);
  });

  it('prints as ZeroRange(max)', () => {
    expect(new ZeroRange(7).toString()).toBe('ZeroRange(7)');
  });

  it('rejects a negative or fractional end', () => {
    expect(() => new ZeroRange(-1)).toThrow(DomainError);
    expect(() => new ZeroRange(1.5)).toThrow(TypeError);
  });
});
