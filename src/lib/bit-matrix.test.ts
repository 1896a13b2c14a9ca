import { describe, it, expect } from 'vitest';
import { BitMatrix } from './bit-matrix';

describe('BitMatrix', () => {
  it('starts blank and remembers set pixels', () => {
    const matrix = new BitMatrix(3, 2);
    expect(matrix.get(2, 1)).toBe(false);

    matrix.set(2, 1);
    expect(matrix.get(2, 1)).toBe(true);

    matrix.set(2, 1, false);
    expect(matrix.get(2, 1)).toBe(false);
  });

  it('rejects non-positive or fractional dimensions', () => {
    expect(() => new BitMatrix(0, 5)).toThrow(RangeError);
    expect(() => new BitMatrix(5, -1)).toThrow(RangeError);
    expect(() => new BitMatrix(2.5, 2)).toThrow(RangeError);
  });

  it('treats out-of-range access as a programming error', () => {
    const matrix = new BitMatrix(4, 4);
    expect(() => matrix.get(4, 0)).toThrow(RangeError);
    expect(() => matrix.get(0, -1)).toThrow(RangeError);
    expect(() => matrix.set(1, 4)).toThrow(RangeError);
  });

  it('parses X/. pictures', () => {
    const matrix = BitMatrix.parse(`
      X..
      .X.
    `);
    expect(matrix.width).toBe(3);
    expect(matrix.height).toBe(2);
    expect(matrix.toRows()).toEqual([
      [true, false, false],
      [false, true, false],
    ]);
  });

  it('rejects ragged rows', () => {
    expect(() => BitMatrix.fromRows([[true, false], [true]])).toThrow(RangeError);
  });

  describe('on-bit corners', () => {
    it('finds the first and last on pixels in raster order', () => {
      const matrix = BitMatrix.parse(`
        .....
        ..X.X
        .X...
        ...X.
        .....
      `);
      expect(matrix.getTopLeftOnBit()).toEqual({ x: 2, y: 1 });
      expect(matrix.getBottomRightOnBit()).toEqual({ x: 3, y: 3 });
    });

    it('returns null for a blank matrix', () => {
      const matrix = new BitMatrix(6, 6);
      expect(matrix.getTopLeftOnBit()).toBeNull();
      expect(matrix.getBottomRightOnBit()).toBeNull();
    });
  });

  it('compares by size and content', () => {
    const a = BitMatrix.parse('X.\n.X');
    const b = BitMatrix.fromRows([
      [true, false],
      [false, true],
    ]);
    expect(a.equals(b)).toBe(true);

    b.set(1, 0);
    expect(a.equals(b)).toBe(false);
    expect(a.equals(new BitMatrix(2, 3))).toBe(false);
  });

  it('renders with block characters', () => {
    expect(BitMatrix.parse('X.\n.X').toString()).toBe('█░\n░█');
    expect(BitMatrix.parse('X.').toString('#', ' ')).toBe('# ');
  });
});
