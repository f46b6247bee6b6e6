import { FALLBACK_SEED } from "../constants";

/**
 * Tiny deterministic PRNG (LCG) so initial beds are reproducible.
 */
export class SeededRandom {
  private state: number;

  /**
   * @param seed integer, taken modulo 2^32; zero falls back to a fixed non-zero seed
   */
  constructor(seed: number) {
    this.state = (seed | 0) || FALLBACK_SEED;
  }

  /** Returns a uint32 and advances state */
  nextU32(): number {
    // Numerical Recipes LCG: (a=1664525, c=1013904223, m=2^32)
    this.state = (Math.imul(1664525, this.state) + 1013904223) >>> 0;
    return this.state;
  }

  /** Float in [0, 1) */
  float(): number {
    return this.nextU32() / 0x100000000;
  }

  /** Fills the array with floats in [0, 1), in index order. */
  fill(target: Float64Array): Float64Array {
    for (let i = 0; i < target.length; i++) {
      target[i] = this.float();
    }
    return target;
  }
}

/** Picks a seed when the caller gave none, so the run can still be replayed. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff) + 1;
}
