/**
 * "Pure barcode" grid extraction.
 *
 * Assumes an axis-aligned symbol that fills most of the frame and reads its
 * module grid straight off the pixels: bounds from the outermost dark
 * pixels, module size from transition counts, then one vote per module.
 * Every derived parameter is checked and a contradiction ends in NotFound
 * rather than a corrupt grid.
 */

import { BitMatrix } from './bit-matrix';
import { debugLog, isDebugMode } from './debug';
import { sampleModule } from './grid-sampler';
import { estimateModuleSize } from './module-size';
import { notFound, ok, type Outcome } from './outcome';

/** Smallest QR symbol (version 1) is 21 modules wide */
export const MIN_MODULE_COUNT = 21;

export interface PureGridGeometry {
  /** Estimated module size in pixels */
  moduleSize: number;
  /** Pixel position of the first sample, after nudging */
  left: number;
  top: number;
  /** Module grid dimensions */
  width: number;
  height: number;
}

/**
 * QR symbols are square. A large aspect mismatch means one bound is wrong,
 * so both sides fall back to the smaller dimension.
 */
export function squareUpDimensions(width: number, height: number): { width: number; height: number } {
  const smaller = Math.min(width, height);
  if (Math.abs(width - height) > Math.floor(smaller / 5)) {
    return { width: smaller, height: smaller };
  }
  return { width, height };
}

/**
 * Work out where the module grid sits without sampling it.
 */
export function measurePureGrid(image: BitMatrix): Outcome<PureGridGeometry> {
  const leftTopBlack = image.getTopLeftOnBit();
  const rightBottomBlack = image.getBottomRightOnBit();
  if (!leftTopBlack || !rightBottomBlack) {
    return notFound('Matrix has no dark pixels');
  }

  const estimate = estimateModuleSize(image, leftTopBlack);
  if (!estimate.success) {
    return estimate;
  }
  const moduleSize = estimate.value;

  let top = leftTopBlack.y;
  let bottom = rightBottomBlack.y;
  let left = leftTopBlack.x;
  let right = rightBottomBlack.x;

  debugLog('PURE 1 - Raw bounds', { left, top, right, bottom });

  if (left >= right || top >= bottom) {
    const reach = Math.floor(moduleSize * MIN_MODULE_COUNT);
    if (left >= right) {
      right = Math.min(image.width - 1, left + reach);
    }
    if (top >= bottom) {
      bottom = Math.min(image.height - 1, top + reach);
    }
    debugLog('PURE 1 - Corrected bounds', { left, top, right, bottom });

    if (left >= right || top >= bottom) {
      return notFound(`Degenerate symbol bounds (${left}, ${top})-(${right}, ${bottom})`);
    }
  }

  const measuredWidth = Math.round((right - left + 1) / moduleSize);
  const measuredHeight = Math.round((bottom - top + 1) / moduleSize);
  if (measuredWidth <= 0 || measuredHeight <= 0) {
    return notFound(`Module grid of ${measuredWidth}x${measuredHeight} is empty`);
  }

  const { width, height } = squareUpDimensions(measuredWidth, measuredHeight);

  debugLog('PURE 3 - Dimensions', { measuredWidth, measuredHeight, width, height });

  // Sample module centres rather than edges
  const nudge = Math.floor(moduleSize / 2);
  top += nudge;
  left += nudge;

  const nudgedTooFarRight = left + Math.floor((width - 1) * moduleSize) - right;
  if (nudgedTooFarRight > 0) {
    if (nudgedTooFarRight > nudge) {
      return notFound(`Last column lands ${nudgedTooFarRight}px past the right edge`);
    }
    left -= nudgedTooFarRight;
  }

  const nudgedTooFarDown = top + Math.floor((height - 1) * moduleSize) - bottom;
  if (nudgedTooFarDown > 0) {
    if (nudgedTooFarDown > nudge) {
      return notFound(`Last row lands ${nudgedTooFarDown}px past the bottom edge`);
    }
    top -= nudgedTooFarDown;
  }

  debugLog('PURE 4 - Nudged origin', { nudge, left, top, nudgedTooFarRight, nudgedTooFarDown });

  return ok({ moduleSize, left, top, width, height });
}

export function extractPureBits(image: BitMatrix): Outcome<BitMatrix> {
  const measured = measurePureGrid(image);
  if (!measured.success) {
    return measured;
  }
  const { moduleSize, left, top, width, height } = measured.value;
  const sampleSize = Math.floor(moduleSize);

  const bits = new BitMatrix(width, height);
  for (let y = 0; y < height; y++) {
    const iOffset = top + Math.floor(y * moduleSize);
    for (let x = 0; x < width; x++) {
      if (sampleModule(image, left + Math.floor(x * moduleSize), iOffset, sampleSize)) {
        bits.set(x, y);
      }
    }
  }

  if (isDebugMode()) {
    console.log('[QR DEBUG] Extracted grid:\n' + bits.toString());
  }

  return ok(bits);
}
