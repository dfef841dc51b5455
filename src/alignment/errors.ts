/**
 * Raised for malformed input: empty tracks, non-increasing or non-finite
 * timestamps, all-NaN tracks, invalid configuration values.
 *
 * Unlike INSUFFICIENT_OVERLAP / DEGENERATE_SIGNAL this is never reported
 * as a status: it points at an upstream bug.
 */
export class InvalidInputError extends Error {
  readonly code = "INVALID_INPUT" as const;

  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid input for ${field}: ${reason}`);
    this.name = "InvalidInputError";
  }
}

export function isInvalidInputError(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}
