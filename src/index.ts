export { BedformSimulation } from "./simulation/bedform-simulation";
export type { RunOptions } from "./simulation/bedform-simulation";
export { GridTopology } from "./simulation/topology";
export { HeightField } from "./simulation/grid";
export { SeededRandom } from "./simulation/rng";
export { diffuse } from "./simulation/diffusion";
export { saltate } from "./simulation/saltation";
export { resolveParams } from "./simulation/params";
export type { BedformOptions, BedformParams, DiagonalMode } from "./simulation/params";
export { SimulationStepper } from "./simulation/simulation-stepper";
export type { Steppable } from "./simulation/simulation-stepper";
export { consoleProgress, formatProgress } from "./reporting/progress";
export type { ProgressCallback } from "./reporting/progress";
export { InvalidArgumentError, NumericInstabilityError } from "./errors";
export { fieldSum, fieldRange, roundHalfEven } from "./utils/grid-utils";
export type { IHeightField } from "./types/grid-types";
export type { HeightSnapshot, SnapshotSink } from "./types/snapshot-types";
export * as defaults from "./constants";
