import type { IHeightField } from "../types/grid-types";

/** Rounds to the nearest integer, ties to even (2.5 → 2, 3.5 → 4). */
export function roundHalfEven(v: number): number {
  const floor = Math.floor(v);
  const diff = v - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Sum of all heights. */
export function fieldSum(field: IHeightField): number {
  let sum = 0;
  for (let i = 0; i < field.heights.length; i++) {
    sum += field.heights[i];
  }
  return sum;
}

/** Compute the min and max height across the field. */
export function fieldRange(field: IHeightField): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < field.heights.length; i++) {
    if (field.heights[i] < min) min = field.heights[i];
    if (field.heights[i] > max) max = field.heights[i];
  }
  return { min, max };
}

/** Index of the first non-finite height, or -1 when every height is finite. */
export function firstNonFinite(heights: Float64Array): number {
  for (let i = 0; i < heights.length; i++) {
    if (!Number.isFinite(heights[i])) return i;
  }
  return -1;
}
