import { DEFAULT_STEPS_PER_SECOND } from "../constants";
import type { HeightSnapshot, SnapshotSink } from "../types/snapshot-types";

/** The part of BedformSimulation the stepper drives. */
export interface Steppable {
  step(): void;
  snapshot(): HeightSnapshot;
}

/**
 * Steps a simulation at a target steps-per-second rate, independent of frame
 * rate, and hands the sink one snapshot per frame that advanced. Tracks
 * performance metrics.
 */
export class SimulationStepper {
  targetStepsPerSecond = DEFAULT_STEPS_PER_SECOND;
  paused = false;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps executed by the most recent advance(). */
  lastStepsThisFrame = 0;

  private accumulator = 0;
  private readonly sim: Steppable;
  private readonly sink: SnapshotSink | null;

  /** EMA smoothing factor — ~0.05 at 30fps gives a ~660ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(sim: Steppable, sink: SnapshotSink | null = null) {
    this.sim = sim;
    this.sink = sink;
  }

  /**
   * Called once per frame. Determines how many steps to run based on
   * elapsed time and the target rate, then executes them.
   *
   * @param deltaMs — milliseconds since the last frame
   */
  advance(deltaMs: number): void {
    if (this.paused) {
      this.stepTimeMs = 0;
      this.lastStepsThisFrame = 0;
      // Don't update actualStepsPerSecond — keep last value frozen while paused
      return;
    }

    const deltaSeconds = deltaMs / 1000;
    if (deltaSeconds <= 0) return;

    this.accumulator += this.targetStepsPerSecond * deltaSeconds;
    const stepsThisFrame = Math.floor(this.accumulator);
    this.accumulator -= stepsThisFrame;

    const t0 = performance.now();
    for (let i = 0; i < stepsThisFrame; i++) {
      this.sim.step();
    }
    const rawStepTimeMs = performance.now() - t0;
    this.lastStepsThisFrame = stepsThisFrame;
    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    const instantStepsPerSecond = stepsThisFrame / deltaSeconds;
    this.actualStepsPerSecond =
      this.emaAlpha * instantStepsPerSecond +
      (1 - this.emaAlpha) * this.actualStepsPerSecond;

    if (this.sink && stepsThisFrame > 0) {
      const snapshot = this.sim.snapshot();
      void Promise.resolve(this.sink.accept(snapshot)).catch((err: unknown) => {
        console.error(`Failed to deliver snapshot ${snapshot.step}:`, err);
      });
    }
  }
}
