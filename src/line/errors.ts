/**
 * Error kinds raised by the line calculation core.
 */

export class InvalidArgumentError extends Error {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

export class NumericalDivergenceError extends Error {
  readonly quantity: string;
  readonly roots: number[];

  constructor(quantity: string, message: string, roots: number[] = []) {
    super(message);
    this.name = "NumericalDivergenceError";
    this.quantity = quantity;
    this.roots = roots;
  }
}

/** Throws unless `value` is a finite number greater than zero. */
export function requirePositive(argument: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(argument, `${argument} must be a positive number (got ${value}).`);
  }
  return value;
}

export function requireFinite(argument: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(argument, `${argument} must be a finite number (got ${value}).`);
  }
  return value;
}
