import type { IHeightField } from "./grid-types";

/** Height field copied after a completed step. Owned by the receiver. */
export interface HeightSnapshot extends IHeightField {
  /** 1-based index of the step that produced this field. */
  readonly step: number;
}

/**
 * Receives snapshots as they are produced. A returned promise is not awaited;
 * the simulation keeps stepping while delivery is in flight.
 */
export interface SnapshotSink {
  accept(snapshot: HeightSnapshot): void | Promise<void>;
}
