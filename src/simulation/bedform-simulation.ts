import { HeightField } from "./grid";
import { GridTopology } from "./topology";
import { SeededRandom, randomSeed } from "./rng";
import { diffuse } from "./diffusion";
import { saltate } from "./saltation";
import {
  resolveParams, resolveDimensions, assertSeed, assertInitialHeights, assertSteps,
} from "./params";
import type { BedformOptions, BedformParams } from "./params";
import { NumericInstabilityError } from "../errors";
import { DEFAULT_STEPS } from "../constants";
import { firstNonFinite } from "../utils/grid-utils";
import type { ProgressCallback } from "../reporting/progress";
import type { IHeightField } from "../types/grid-types";
import type { HeightSnapshot, SnapshotSink } from "../types/snapshot-types";

export interface RunOptions {
  /** Checked before each step; an aborted run returns the snapshots taken so far. */
  signal?: AbortSignal;
  /** Receives each snapshot as soon as its step completes. */
  sink?: SnapshotSink;
  /** Called after each step with the number of steps done and requested. */
  onProgress?: ProgressCallback;
}

/** Follows whichever buffer is current, so a held view never goes stale. */
class LiveField implements IHeightField {
  constructor(
    readonly cols: number,
    readonly rows: number,
    private readonly read: () => Float64Array,
  ) {}

  get heights(): Float64Array {
    return this.read();
  }
}

/**
 * Cell model of bedform growth (Nishimori & Ouchi, 1993).
 *
 * Sediment moves in two modes each step: rolling and sliding (diffusion) and
 * saltation (hops downstream along x whose length grows with height).
 */
export class BedformSimulation {
  readonly topology: GridTopology;
  readonly params: Readonly<BedformParams>;
  readonly seed: number;

  private current: HeightField;
  private next: HeightField;
  private readonly dest: Int32Array;
  private readonly view: LiveField;
  private steps = 0;

  constructor(options: BedformOptions = {}) {
    const { cols, rows } = resolveDimensions(options);
    this.params = Object.freeze(resolveParams(options));
    this.seed = options.seed ?? randomSeed();
    assertSeed(this.seed);

    this.topology = new GridTopology(cols, rows);
    this.current = new HeightField(cols, rows);
    this.next = new HeightField(cols, rows);
    this.dest = new Int32Array(cols * rows);
    this.view = new LiveField(cols, rows, () => this.current.heights);

    if (options.initialHeights) {
      assertInitialHeights(options.initialHeights, cols * rows);
      this.current.copyFrom(options.initialHeights);
    } else {
      new SeededRandom(this.seed).fill(this.current.heights);
    }
  }

  /** Number of steps applied since construction. */
  get stepCount(): number {
    return this.steps;
  }

  /**
   * Read-only view of the live field. The same object is returned every time
   * and its heights always show the latest completed step.
   */
  currentField(): IHeightField {
    return this.view;
  }

  /** Immutable copy of the current field, tagged with the step count. */
  snapshot(): HeightSnapshot {
    const { cols, rows, heights } = this.current;
    return { step: this.steps, cols, rows, heights: heights.slice() };
  }

  /**
   * Advance one step.
   *
   * 1. Diffuse the current field into the back buffer
   * 2. Saltate in the back buffer, stopping on a non-finite hop length
   * 3. Verify every height is finite, then swap buffers
   *
   * On a failure the buffers are not swapped and the current field is the one
   * from before this step.
   */
  step(): void {
    const { D, Q, L0, b, diagonals } = this.params;

    diffuse(this.current, this.next, this.topology, D, diagonals);
    const badHop = saltate(this.next, this.topology, Q, L0, b, this.dest);
    if (badHop >= 0) {
      const length = L0 + b * this.next.heights[badHop];
      throw new NumericInstabilityError(this.steps + 1, badHop, length, "hop length");
    }

    const bad = firstNonFinite(this.next.heights);
    if (bad >= 0) {
      throw new NumericInstabilityError(this.steps + 1, bad, this.next.heights[bad]);
    }

    const done = this.current;
    this.current = this.next;
    this.next = done;
    this.steps++;
  }

  /**
   * Apply `steps` steps in order and return one snapshot per completed step.
   * The returned sequence belongs to this call; a later run starts a new one.
   */
  run(steps = DEFAULT_STEPS, options: RunOptions = {}): HeightSnapshot[] {
    assertSteps(steps);
    const { signal, sink, onProgress } = options;
    const snapshots: HeightSnapshot[] = [];

    for (let i = 0; i < steps; i++) {
      if (signal?.aborted) break;

      this.step();
      const snap = this.snapshot();
      snapshots.push(snap);
      if (sink) deliver(sink, snap);
      onProgress?.(i + 1, steps);
    }

    return snapshots;
  }
}

function deliver(sink: SnapshotSink, snapshot: HeightSnapshot): void {
  void Promise.resolve(sink.accept(snapshot)).catch((err: unknown) => {
    console.error(`Failed to deliver snapshot ${snapshot.step}:`, err);
  });
}
