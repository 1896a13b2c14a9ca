/**
 * Module size estimation from the top-left dark pixel of a symbol.
 *
 * Diagonally from the corner of a finder pattern the runs read 1:1:3:1:1
 * modules and are followed by the light separator, so five transitions
 * span seven modules. The axis rays reuse the same ratio.
 */

import type { BitMatrix, PixelPoint } from './bit-matrix';
import { debugLog } from './debug';
import { notFound, ok, type Outcome } from './outcome';
import { DIAGONAL, HORIZONTAL, VERTICAL, scanTransitions } from './transitions';

export const REQUIRED_TRANSITIONS = 5;
export const MODULES_SPANNED = 7;

export type ScanAxis = 'horizontal' | 'vertical';

export function moduleSizeFromDiagonal(matrix: BitMatrix, anchor: PixelPoint): Outcome<number> {
  const scan = scanTransitions(matrix, anchor, DIAGONAL, REQUIRED_TRANSITIONS);
  if (scan.reachedEdge || scan.transitions < REQUIRED_TRANSITIONS) {
    return notFound(
      `Diagonal from (${anchor.x}, ${anchor.y}) crossed ${scan.transitions} of ${REQUIRED_TRANSITIONS} transitions`
    );
  }
  return ok(scan.distance / MODULES_SPANNED);
}

/**
 * Same measurement along one axis. Returns null when the ray runs out of
 * matrix first; an axis estimate only refines the diagonal one.
 */
export function moduleSizeOneWay(matrix: BitMatrix, anchor: PixelPoint, axis: ScanAxis): number | null {
  const scan = scanTransitions(
    matrix,
    anchor,
    axis === 'horizontal' ? HORIZONTAL : VERTICAL,
    REQUIRED_TRANSITIONS
  );
  if (scan.reachedEdge || scan.transitions < REQUIRED_TRANSITIONS) {
    return null;
  }
  return scan.distance / MODULES_SPANNED;
}

export function estimateModuleSize(matrix: BitMatrix, anchor: PixelPoint): Outcome<number> {
  const diagonal = moduleSizeFromDiagonal(matrix, anchor);
  if (!diagonal.success) {
    return diagonal;
  }

  const horizontal = moduleSizeOneWay(matrix, anchor, 'horizontal');
  const vertical = moduleSizeOneWay(matrix, anchor, 'vertical');

  const estimates = [diagonal.value];
  if (horizontal !== null) estimates.push(horizontal);
  if (vertical !== null) estimates.push(vertical);

  const moduleSize = estimates.reduce((a, b) => a + b, 0) / estimates.length;

  debugLog('PURE 2 - Module size', {
    diagonal: diagonal.value,
    horizontal,
    vertical,
    moduleSize,
  });

  return ok(moduleSize);
}
