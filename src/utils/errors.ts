/**
 * Error types raised by chart models
 */

export class LengthMismatchError extends Error {
  constructor(
    public readonly xLength: number,
    public readonly yLength: number
  ) {
    super(`x and y sequences differ in length (${xLength} vs ${yLength})`);
    this.name = 'LengthMismatchError';
  }
}

export class InvalidValueError extends Error {
  constructor(
    public readonly label: string,
    public readonly value: number
  ) {
    super(`Value for "${label}" must be a finite number >= 0, got ${value}`);
    this.name = 'InvalidValueError';
  }
}

/**
 * Guard for bar and segment values
 */
export function assertNonNegative(label: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidValueError(label, value);
  }
}
