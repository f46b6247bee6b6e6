/** Thrown at construction or run entry when an argument is out of its domain. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a step produces a non-finite height or saltation hop length.
 * The simulation keeps the field from before the failed step.
 */
export class NumericInstabilityError extends Error {
  readonly step: number;
  readonly cellIndex: number;
  readonly value: number;

  readonly quantity: "height" | "hop length";

  constructor(step: number, cellIndex: number, value: number, quantity: "height" | "hop length" = "height") {
    super(`Non-finite ${quantity} ${value} at cell ${cellIndex} during step ${step}`);
    this.name = "NumericInstabilityError";
    this.step = step;
    this.cellIndex = cellIndex;
    this.value = value;
    this.quantity = quantity;
  }
}
