// ── Grid ──

/** Default number of columns (X, the transport axis). */
export const DEFAULT_COLS = 100;

/** Default number of rows (Y). */
export const DEFAULT_ROWS = 50;

// ── Rolling and sliding ──

/** Diffusion coefficient D. Center keeps 1 - D, axis neighbors D/6, diagonals D/12. */
export const DEFAULT_DIFFUSION = 0.8;

/** Weight of each axis neighbor in the diffusion stencil, before multiplying by D. */
export const AXIS_WEIGHT = 1 / 6;

/** Weight of each diagonal neighbor in the diffusion stencil, before multiplying by D. */
export const DIAGONAL_WEIGHT = 1 / 12;

// ── Saltation ──

/** Entrainment rate Q: height picked up from every cell each step. */
export const DEFAULT_ENTRAINMENT = 0.6;

/** Minimum saltation length L0, in cells. */
export const DEFAULT_BASE_LENGTH = 7.3;

/** Slope b of saltation length with height: L = L0 + b·h. */
export const DEFAULT_LENGTH_SLOPE = 2.0;

// ── Runs ──

/** Default number of steps for a run. */
export const DEFAULT_STEPS = 100;

/** Default simulation steps executed per second of wall-clock time by the stepper. */
export const DEFAULT_STEPS_PER_SECOND = 30;

/** Largest accepted seed; SeededRandom keeps 32 bits of state. */
export const MAX_SEED = 0xffffffff;

/** Fallback seed for SeededRandom when given zero. */
export const FALLBACK_SEED = 123456789;
