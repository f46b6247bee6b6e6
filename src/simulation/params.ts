import {
  DEFAULT_COLS, DEFAULT_ROWS, DEFAULT_DIFFUSION, DEFAULT_ENTRAINMENT,
  DEFAULT_BASE_LENGTH, DEFAULT_LENGTH_SLOPE, MAX_SEED,
} from "../constants";
import { InvalidArgumentError } from "../errors";

/**
 * Which cells the diagonal part of the diffusion stencil samples.
 *
 * - "symmetric": all four diagonals (x±1, y±1).
 * - "legacy": (x+1, y+1), (x+1, y-1), (x-1, y+1) twice, never (x-1, y-1).
 *   Reproduces beds generated by the earlier asymmetric stencil.
 */
export type DiagonalMode = "symmetric" | "legacy";

export interface BedformParams {
  /** Diffusion coefficient for rolling and sliding. */
  D: number;
  /** Entrainment rate of saltation. */
  Q: number;
  /** Minimum saltation length. */
  L0: number;
  /** Growth of saltation length with height. */
  b: number;
  diagonals: DiagonalMode;
}

export interface BedformOptions extends Partial<BedformParams> {
  cols?: number;
  rows?: number;
  /** Integer seed for the initial bed. A random one is drawn when omitted. */
  seed?: number;
  /** Starting heights, row-major, length cols * rows. Replaces the random bed. */
  initialHeights?: ArrayLike<number>;
}

export function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a finite number, got ${value}`);
  }
}

/** Fills in defaults and validates. Throws InvalidArgumentError on bad input. */
export function resolveParams(options: BedformOptions = {}): BedformParams {
  const params: BedformParams = {
    D: options.D ?? DEFAULT_DIFFUSION,
    Q: options.Q ?? DEFAULT_ENTRAINMENT,
    L0: options.L0 ?? DEFAULT_BASE_LENGTH,
    b: options.b ?? DEFAULT_LENGTH_SLOPE,
    diagonals: options.diagonals ?? "symmetric",
  };

  assertFinite("D", params.D);
  assertFinite("Q", params.Q);
  assertFinite("L0", params.L0);
  assertFinite("b", params.b);
  if (params.Q < 0) {
    throw new InvalidArgumentError(`Q must be non-negative, got ${params.Q}`);
  }
  if (params.diagonals !== "symmetric" && params.diagonals !== "legacy") {
    throw new InvalidArgumentError(`Unknown diagonal mode: ${String(params.diagonals)}`);
  }
  return params;
}

export function resolveDimensions(options: BedformOptions = {}): { cols: number; rows: number } {
  const cols = options.cols ?? DEFAULT_COLS;
  const rows = options.rows ?? DEFAULT_ROWS;
  assertDimension("cols", cols);
  assertDimension("rows", rows);
  return { cols, rows };
}

/** Seeds are unsigned 32-bit integers; zero is reserved for the fallback seed. */
export function assertSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 1 || seed > MAX_SEED) {
    throw new InvalidArgumentError(`seed must be an integer in [1, ${MAX_SEED}], got ${seed}`);
  }
}

export function assertInitialHeights(heights: ArrayLike<number>, size: number): void {
  if (heights.length !== size) {
    throw new InvalidArgumentError(`initialHeights must have ${size} values, got ${heights.length}`);
  }
  for (let i = 0; i < heights.length; i++) {
    assertFinite(`initialHeights[${i}]`, heights[i]);
  }
}

export function assertSteps(steps: number): void {
  if (!Number.isInteger(steps) || steps < 0) {
    throw new InvalidArgumentError(`steps must be a non-negative integer, got ${steps}`);
  }
}
