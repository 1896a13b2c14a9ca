import { describe, it, expect } from 'vitest';
import { BitMatrix } from './bit-matrix';
import { estimateModuleSize, moduleSizeFromDiagonal, moduleSizeOneWay } from './module-size';
import { finderAndDataTopRow, renderModules, syntheticModules } from './synthetic-symbol';

const DIAGONAL_RUNS = [true, false, true, true, true, false, true, false];
const AXIS_RUNS = 'XX..XXXXXX..XX..';

/**
 * 1-pixel finder profile on the diagonal; the given ray carries runs whose
 * fifth transition lands 14 pixels out, the other axis stays dark.
 */
function matrixWithAxisRuns(axis: 'horizontal' | 'vertical'): BitMatrix {
  const horizontal = axis === 'horizontal';
  const matrix = horizontal ? new BitMatrix(16, 8) : new BitMatrix(8, 16);
  Array.from(AXIS_RUNS).forEach((ch, i) => {
    if (ch === 'X') {
      if (horizontal) matrix.set(i, 0);
      else matrix.set(0, i);
    }
  });
  for (let i = 0; i < 8; i++) {
    if (horizontal) matrix.set(0, i);
    else matrix.set(i, 0);
  }
  DIAGONAL_RUNS.forEach((on, k) => matrix.set(k, k, on));
  return matrix;
}

describe('moduleSizeFromDiagonal', () => {
  it('divides the distance to the fifth transition by seven', () => {
    const image = renderModules(syntheticModules(21), 3, 5);
    const size = moduleSizeFromDiagonal(image, { x: 5, y: 5 });
    expect(size).toEqual({ success: true, value: 3 });
  });

  it('fails with NotFound when the diagonal runs out first', () => {
    const image = BitMatrix.parse(`
      XXX
      XXX
      XXX
    `);
    const size = moduleSizeFromDiagonal(image, { x: 0, y: 0 });
    expect(size.success).toBe(false);
    if (!size.success) {
      expect(size.error.kind).toBe('NotFound');
    }
  });
});

describe('moduleSizeOneWay', () => {
  it('measures along a row', () => {
    expect(moduleSizeOneWay(matrixWithAxisRuns('horizontal'), { x: 0, y: 0 }, 'horizontal')).toBe(2);
  });

  it('measures down a column', () => {
    expect(moduleSizeOneWay(matrixWithAxisRuns('vertical'), { x: 0, y: 0 }, 'vertical')).toBe(2);
  });

  it('returns null instead of failing when the ray reaches the edge', () => {
    expect(moduleSizeOneWay(matrixWithAxisRuns('horizontal'), { x: 0, y: 0 }, 'vertical')).toBeNull();
  });
});

describe('estimateModuleSize', () => {
  it('uses the diagonal alone when both axis rays are unusable', () => {
    const image = renderModules(syntheticModules(25), 4);
    expect(estimateModuleSize(image, { x: 0, y: 0 })).toEqual({ success: true, value: 4 });
  });

  it('averages usable axis estimates with the diagonal', () => {
    expect(estimateModuleSize(matrixWithAxisRuns('horizontal'), { x: 0, y: 0 })).toEqual({
      success: true,
      value: 1.5,
    });
    expect(estimateModuleSize(matrixWithAxisRuns('vertical'), { x: 0, y: 0 })).toEqual({
      success: true,
      value: 1.5,
    });
  });

  it('lets data modules on the top row pull the average above the true size', () => {
    // diagonal: 28px / 7 = 4; horizontal: fifth transition at 48px, 48 / 7
    const image = renderModules(finderAndDataTopRow(21), 4);

    expect(moduleSizeFromDiagonal(image, { x: 0, y: 0 })).toEqual({ success: true, value: 4 });
    expect(moduleSizeOneWay(image, { x: 0, y: 0 }, 'horizontal')).toBeCloseTo(48 / 7, 10);
    expect(moduleSizeOneWay(image, { x: 0, y: 0 }, 'vertical')).toBeNull();

    const size = estimateModuleSize(image, { x: 0, y: 0 });
    expect(size.success).toBe(true);
    if (size.success) {
      expect(size.value).toBeCloseTo(38 / 7, 10);
    }
  });

  it('fails when the diagonal fails even though an axis would measure', () => {
    const image = matrixWithAxisRuns('horizontal');
    for (let k = 1; k < 8; k++) image.set(k, k);

    const size = estimateModuleSize(image, { x: 0, y: 0 });
    expect(size.success).toBe(false);
    if (!size.success) {
      expect(size.error.kind).toBe('NotFound');
    }
  });
});
