/**
 * Fixed-size grid of on/off pixels (or modules), addressed as (x, y) with
 * x growing rightward and y growing downward.
 *
 * Sizes and coordinates are programmer-supplied, so bad ones throw
 * RangeError instead of producing an Outcome.
 */

export interface PixelPoint {
  x: number;
  y: number;
}

export class BitMatrix {
  private readonly bits: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`BitMatrix dimensions must be positive integers, got ${width}x${height}`);
    }
    this.bits = new Uint8Array(width * height);
  }

  /**
   * Build a matrix from rows of booleans. All rows must share one length.
   */
  static fromRows(rows: readonly (readonly boolean[])[]): BitMatrix {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const matrix = new BitMatrix(width, height);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new RangeError(`Row ${y} has ${row.length} cells, expected ${width}`);
      }
      row.forEach((value, x) => {
        if (value) matrix.set(x, y);
      });
    });
    return matrix;
  }

  /**
   * Parse a picture such as `"X.X\n.X."`. `X` is on, anything else is off;
   * blank lines and surrounding whitespace are ignored.
   */
  static parse(text: string, on = 'X'): BitMatrix {
    const rows = text
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .map(line => Array.from(line, ch => ch === on));
    return BitMatrix.fromRows(rows);
  }

  get(x: number, y: number): boolean {
    return this.bits[this.offset(x, y)] === 1;
  }

  set(x: number, y: number, value = true): void {
    this.bits[this.offset(x, y)] = value ? 1 : 0;
  }

  /** First on pixel in raster order, or null for a blank matrix. */
  getTopLeftOnBit(): PixelPoint | null {
    const index = this.bits.indexOf(1);
    return index < 0 ? null : { x: index % this.width, y: Math.floor(index / this.width) };
  }

  /** Last on pixel in raster order, or null for a blank matrix. */
  getBottomRightOnBit(): PixelPoint | null {
    const index = this.bits.lastIndexOf(1);
    return index < 0 ? null : { x: index % this.width, y: Math.floor(index / this.width) };
  }

  toRows(): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: boolean[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(this.get(x, y));
      }
      rows.push(row);
    }
    return rows;
  }

  equals(other: BitMatrix): boolean {
    if (other.width !== this.width || other.height !== this.height) return false;
    return this.bits.every((bit, i) => bit === other.bits[i]);
  }

  toString(on = '█', off = '░'): string {
    return this.toRows()
      .map(row => row.map(value => (value ? on : off)).join(''))
      .join('\n');
  }

  private offset(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`(${x}, ${y}) is outside a ${this.width}x${this.height} matrix`);
    }
    return y * this.width + x;
  }
}
