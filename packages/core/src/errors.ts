/**
 * Error classes shared across the core
 */

/**
 * Thrown when an internal consistency rule of the simulation is broken.
 *
 * Indicates a defect in the engine, never bad input.
 */
export class InvariantViolation extends Error {
  public readonly level: string | undefined;

  constructor(message: string, level?: string | undefined) {
    super(message);
    this.name = 'InvariantViolation';
    this.level = level;
  }
}

/**
 * Error thrown when a configuration or trace file cannot be read
 */
export class InputLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    filePath: string,
    errorCause?: Error | undefined
  ) {
    super(message);
    this.name = 'InputLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}
