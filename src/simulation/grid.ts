import type { IHeightField } from "../types/grid-types";

function wrap(v: number, n: number): number {
  return ((v % n) + n) % n;
}

/**
 * Surface elevation on a doubly periodic grid.
 *
 * heights[y * cols + x] = elevation of the cell in column x, row y.
 * Column x runs along the transport direction. Both axes wrap.
 */
export class HeightField implements IHeightField {
  readonly cols: number;
  readonly rows: number;
  readonly heights: Float64Array;

  constructor(cols: number, rows: number) {
    this.cols = cols;
    this.rows = rows;
    this.heights = new Float64Array(cols * rows);
  }

  get size(): number {
    return this.heights.length;
  }

  idx(x: number, y: number): number {
    return wrap(y, this.rows) * this.cols + wrap(x, this.cols);
  }

  get(x: number, y: number): number {
    return this.heights[this.idx(x, y)];
  }

  set(x: number, y: number, val: number): void {
    this.heights[this.idx(x, y)] = val;
  }

  /** Overwrites every cell with row-major values of the same length. */
  copyFrom(values: ArrayLike<number>): void {
    if (values.length !== this.heights.length) {
      throw new RangeError(`Expected ${this.heights.length} heights, got ${values.length}`);
    }
    this.heights.set(values);
  }

  clone(): HeightField {
    const copy = new HeightField(this.cols, this.rows);
    copy.heights.set(this.heights);
    return copy;
  }
}
