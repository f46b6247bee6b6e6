import { assertDimension } from "./params";

/**
 * Wrapped neighbor coordinates for every cell of a cols × rows periodic grid.
 *
 * Each array has one entry per cell, laid out like HeightField (y * cols + x).
 * xMinus[i] is the column left of cell i, wrapping 0 → cols - 1; the others
 * follow the same pattern. Diagonals are combinations of an x and a y array.
 */
export class GridTopology {
  readonly cols: number;
  readonly rows: number;
  readonly x: Int32Array;
  readonly y: Int32Array;
  readonly xMinus: Int32Array;
  readonly xPlus: Int32Array;
  readonly yMinus: Int32Array;
  readonly yPlus: Int32Array;

  constructor(cols: number, rows: number) {
    assertDimension("cols", cols);
    assertDimension("rows", rows);
    this.cols = cols;
    this.rows = rows;

    const size = cols * rows;
    this.x = new Int32Array(size);
    this.y = new Int32Array(size);
    this.xMinus = new Int32Array(size);
    this.xPlus = new Int32Array(size);
    this.yMinus = new Int32Array(size);
    this.yPlus = new Int32Array(size);

    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        const i = r * cols + c;
        this.x[i] = c;
        this.y[i] = r;
        this.xMinus[i] = (c - 1 + cols) % cols;
        this.xPlus[i] = (c + 1) % cols;
        this.yMinus[i] = (r - 1 + rows) % rows;
        this.yPlus[i] = (r + 1) % rows;
      }
    }
  }

  get size(): number {
    return this.x.length;
  }

  /** Flat index of (column, row); both must already be in range. */
  index(col: number, row: number): number {
    return row * this.cols + col;
  }
}
