import { AXIS_WEIGHT, DIAGONAL_WEIGHT } from "../constants";
import type { IHeightField } from "../types/grid-types";
import type { HeightField } from "./grid";
import type { DiagonalMode } from "./params";
import type { GridTopology } from "./topology";

/**
 * Rolling and sliding: a 9-point low-pass stencil.
 *
 * h'[i] = h[i] + D · (−h[i] + 1/6 · Σ axis neighbors + 1/12 · Σ diagonal neighbors)
 *
 * Reads only `src` and writes only `dst`, so every cell sees the pre-step
 * field. The stencil weights add up to 1 in both diagonal modes, so on the
 * periodic grid the field sum is unchanged up to rounding.
 */
export function diffuse(
  src: IHeightField,
  dst: HeightField,
  topo: GridTopology,
  D: number,
  diagonals: DiagonalMode,
): void {
  const h = src.heights;
  const out = dst.heights;
  const { cols, xMinus, xPlus, yMinus, yPlus, x, y } = topo;
  const legacy = diagonals === "legacy";

  for (let i = 0; i < h.length; i++) {
    const rowHere = y[i] * cols;
    const rowUp = yPlus[i] * cols;
    const rowDown = yMinus[i] * cols;
    const xp = xPlus[i];
    const xm = xMinus[i];

    const axis = h[rowHere + xp] + h[rowHere + xm] + h[rowUp + x[i]] + h[rowDown + x[i]];
    const diag = h[rowUp + xp] + h[rowDown + xp] + h[rowUp + xm]
      + (legacy ? h[rowUp + xm] : h[rowDown + xm]);

    out[i] = h[i] + D * (-h[i] + AXIS_WEIGHT * axis + DIAGONAL_WEIGHT * diag);
  }
}
