import { describe, it, expect } from 'vitest';
import { BitMatrix } from './bit-matrix';
import { sampleModule } from './grid-sampler';

/** Turn on the first `count` pixels of a window, row by row */
function fillWindow(matrix: BitMatrix, x0: number, y0: number, x1: number, y1: number, count: number): void {
  let remaining = count;
  for (let y = y0; y <= y1 && remaining > 0; y++) {
    for (let x = x0; x <= x1 && remaining > 0; x++) {
      matrix.set(x, y);
      remaining--;
    }
  }
}

describe('sampleModule', () => {
  describe('5x5 vote (module size 4)', () => {
    it.each([
      { on: 9, expected: false }, // 36%
      { on: 10, expected: true }, // 40%
      { on: 11, expected: true }, // 44%
    ])('$on of 25 pixels on reads as $expected', ({ on, expected }) => {
      const matrix = new BitMatrix(7, 7);
      fillWindow(matrix, 1, 1, 5, 5, on);
      expect(sampleModule(matrix, 3, 3, 4)).toBe(expected);
    });

    it('ignores pixels outside the window', () => {
      const matrix = new BitMatrix(7, 7);
      for (let i = 0; i < 7; i++) {
        matrix.set(i, 0);
        matrix.set(i, 6);
        matrix.set(0, i);
        matrix.set(6, i);
      }
      fillWindow(matrix, 1, 1, 5, 5, 9);
      expect(sampleModule(matrix, 3, 3, 4)).toBe(false);
    });
  });

  it('caps the radius at two pixels for large modules', () => {
    const matrix = new BitMatrix(11, 11);
    // the ring of a 7x7 window: 24 of 49 pixels, none inside the 5x5 one
    for (let i = 2; i <= 8; i++) {
      matrix.set(i, 2);
      matrix.set(i, 8);
      matrix.set(2, i);
      matrix.set(8, i);
    }
    expect(sampleModule(matrix, 5, 5, 10)).toBe(false);
  });

  it('uses a 3x3 window for module size 2', () => {
    const three = new BitMatrix(5, 5);
    fillWindow(three, 1, 1, 3, 3, 3);
    expect(sampleModule(three, 2, 2, 2)).toBe(false);

    const four = new BitMatrix(5, 5);
    fillWindow(four, 1, 1, 3, 3, 4);
    expect(sampleModule(four, 2, 2, 2)).toBe(true);
  });

  it('clips the window to the matrix and votes over what remains', () => {
    // centre on the left edge: 3 columns x 5 rows = 15 pixels, 40% is 6
    const five = new BitMatrix(5, 5);
    fillWindow(five, 0, 0, 2, 4, 5);
    expect(sampleModule(five, 0, 2, 5)).toBe(false);

    const six = new BitMatrix(5, 5);
    fillWindow(six, 0, 0, 2, 4, 6);
    expect(sampleModule(six, 0, 2, 5)).toBe(true);
  });

  it('reads the centre pixel directly for 1-pixel modules', () => {
    const matrix = BitMatrix.parse(`
      XXX
      X.X
      XXX
    `);
    expect(sampleModule(matrix, 1, 1, 1)).toBe(false);
    expect(sampleModule(matrix, 0, 0, 1)).toBe(true);
  });
});
