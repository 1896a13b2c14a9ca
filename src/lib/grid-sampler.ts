import type { BitMatrix } from './bit-matrix';

/** Share of on pixels, in percent, at which a module reads as dark */
export const DARK_VOTE_PERCENT = 40;

const MAX_SAMPLE_RADIUS = 2;

/**
 * Read one module by voting over a small square around its centre.
 *
 * Below half on purpose: a faded dark module with 40% of its pixels
 * still dark counts as dark.
 */
export function sampleModule(matrix: BitMatrix, centerX: number, centerY: number, size: number): boolean {
  if (size <= 1) {
    return matrix.get(centerX, centerY);
  }

  const radius = Math.min(MAX_SAMPLE_RADIUS, Math.floor(size / 2));
  let onPixels = 0;
  let totalPixels = 0;

  for (let dy = -radius; dy <= radius; dy++) {
    const y = centerY + dy;
    if (y < 0 || y >= matrix.height) continue;

    for (let dx = -radius; dx <= radius; dx++) {
      const x = centerX + dx;
      if (x < 0 || x >= matrix.width) continue;

      if (matrix.get(x, y)) onPixels++;
      totalPixels++;
    }
  }

  return onPixels * 100 >= totalPixels * DARK_VOTE_PERCENT;
}
