import { roundHalfEven } from "../utils/grid-utils";
import type { HeightField } from "./grid";
import type { GridTopology } from "./topology";

/**
 * Saltation: every cell hands Q of height to the cell L = max(0, L0 + b·h)
 * columns downstream in the same row.
 *
 * Destinations are computed from the incoming field before any height moves.
 * Settling is a sequential scatter-add, so several sources landing on the
 * same cell all count. The field sum is unchanged up to rounding.
 *
 * A hop length that overflows to a non-finite value has no destination column.
 * In that case nothing moves and the index of the offending cell is returned;
 * otherwise the result is -1.
 *
 * @param dest scratch buffer of field.size entries; receives each cell's destination index
 */
export function saltate(
  field: HeightField,
  topo: GridTopology,
  Q: number,
  L0: number,
  b: number,
  dest: Int32Array = new Int32Array(field.size),
): number {
  const h = field.heights;
  const { cols, x, y } = topo;

  for (let i = 0; i < h.length; i++) {
    const length = Math.max(0, L0 + b * h[i]);
    if (!Number.isFinite(length)) return i;
    const col = roundHalfEven(x[i] + length) % cols;
    dest[i] = y[i] * cols + col;
  }

  // Entrainment
  for (let i = 0; i < h.length; i++) {
    h[i] -= Q;
  }

  // Settling
  for (let i = 0; i < h.length; i++) {
    h[dest[i]] += Q;
  }

  return -1;
}
