import type { BitMatrix, PixelPoint } from './bit-matrix';

export interface Direction {
  dx: number;
  dy: number;
}

export const DIAGONAL: Direction = { dx: 1, dy: 1 };
export const HORIZONTAL: Direction = { dx: 1, dy: 0 };
export const VERTICAL: Direction = { dx: 0, dy: 1 };

export interface TransitionScan {
  /** Colour changes seen, at most `limit` */
  transitions: number;
  /** Steps taken from the start before the walk stopped */
  distance: number;
  /** True when the walk ran off the matrix instead of reaching `limit` */
  reachedEdge: boolean;
}

/**
 * Walk from `start` one pixel per step, counting black/white alternations.
 *
 * The walk assumes it starts on black. It stops on the pixel where the
 * `limit`-th transition happens, or once it leaves the matrix.
 */
export function scanTransitions(
  matrix: BitMatrix,
  start: PixelPoint,
  direction: Direction,
  limit = 5
): TransitionScan {
  let x = start.x;
  let y = start.y;
  let inBlack = true;
  let transitions = 0;
  let distance = 0;

  while (inside(matrix, x, y)) {
    if (inBlack !== matrix.get(x, y)) {
      if (++transitions === limit) {
        break;
      }
      inBlack = !inBlack;
    }
    x += direction.dx;
    y += direction.dy;
    distance++;
  }

  return {
    transitions,
    distance,
    reachedEdge: !inside(matrix, x, y),
  };
}

function inside(matrix: BitMatrix, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < matrix.width && y < matrix.height;
}
