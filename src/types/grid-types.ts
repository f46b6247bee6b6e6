/**
 * Read-only interface for a height field.
 * Used by rendering and utility code that reads heights without modifying them.
 */
export interface IHeightField {
  /** Number of columns (X, the transport axis). */
  readonly cols: number;
  /** Number of rows (Y). */
  readonly rows: number;
  /** Row-major heights: cell (x, y) is at y * cols + x. */
  readonly heights: Float64Array;
}
