/**
 * Synthetic, noise-free symbols for tests.
 *
 * The top-left corner holds a 7x7 finder pattern with its light separator
 * on the diagonal, the whole top row and left column are dark, and the
 * bottom-right module is dark. From the anchor only the diagonal ray sees
 * five transitions, so the module size estimate comes out exact.
 */

import { BitMatrix } from './bit-matrix';

function isFinderModule(x: number, y: number): boolean {
  const ring = x === 0 || x === 6 || y === 0 || y === 6;
  const core = x >= 2 && x <= 4 && y >= 2 && y <= 4;
  return ring || core;
}

export function syntheticModules(dimension: number): boolean[][] {
  const modules: boolean[][] = [];
  for (let y = 0; y < dimension; y++) {
    const row: boolean[] = [];
    for (let x = 0; x < dimension; x++) {
      if (x === 0 || y === 0) {
        row.push(true);
      } else if (x < 7 && y < 7) {
        row.push(isFinderModule(x, y));
      } else if (x === 7 || y === 7) {
        // separator
        row.push(false);
      } else {
        row.push((x * 31 + y * 17 + x * y) % 7 < 3);
      }
    }
    modules.push(row);
  }
  modules[dimension - 1][dimension - 1] = true;
  return modules;
}

export function renderModules(
  modules: readonly (readonly boolean[])[],
  moduleSize: number,
  quietZone = 0
): BitMatrix {
  const height = modules.length;
  const width = modules[0].length;
  const image = new BitMatrix(width * moduleSize + 2 * quietZone, height * moduleSize + 2 * quietZone);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!modules[y][x]) continue;
      for (let dy = 0; dy < moduleSize; dy++) {
        for (let dx = 0; dx < moduleSize; dx++) {
          image.set(quietZone + x * moduleSize + dx, quietZone + y * moduleSize + dy);
        }
      }
    }
  }
  return image;
}

/** Copy of the top-left `width` x `height` pixels, blank where the source ends */
export function resize(image: BitMatrix, width: number, height: number): BitMatrix {
  const out = new BitMatrix(width, height);
  for (let y = 0; y < Math.min(height, image.height); y++) {
    for (let x = 0; x < Math.min(width, image.width); x++) {
      if (image.get(x, y)) out.set(x, y);
    }
  }
  return out;
}

/**
 * Like `syntheticModules`, but the top row reads as a real symbol's does:
 * finder, light separator, then data modules `X.XX.` so the horizontal
 * ray from the anchor finds its fifth transition five modules past the
 * finder.
 */
export function finderAndDataTopRow(dimension: number): boolean[][] {
  const modules = syntheticModules(dimension);
  [false, true, false, true, true, false].forEach((on, i) => {
    modules[0][7 + i] = on;
  });
  return modules;
}
