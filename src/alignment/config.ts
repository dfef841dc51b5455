/**
 * Alignment configuration
 *
 * Passed explicitly to the engine (and optionally overridden per call);
 * there is no module-level mutable default.
 */

import { InvalidInputError } from "./errors";

export interface AlignmentConfig {
  /** Common grid rate for resampling (Hz) */
  rateHz: number;
  /** Half-width of the lag search window (s) */
  maxLagSeconds: number;
  /** Minimum grid points in the tracks' time intersection */
  minOverlapSamples: number;
}

export const DEFAULT_ALIGNMENT_CONFIG: Readonly<AlignmentConfig> =
  Object.freeze({
    rateHz: 100,
    maxLagSeconds: 10,
    minOverlapSamples: 8,
  });

// Parabolic refinement needs a sample on each side of the peak
const MIN_OVERLAP_FLOOR = 3;

/**
 * Merge overrides onto `base` and validate the result.
 * @throws InvalidInputError on non-finite or out-of-range values
 */
export function resolveAlignmentConfig(
  overrides: Partial<AlignmentConfig> = {},
  base: Readonly<AlignmentConfig> = DEFAULT_ALIGNMENT_CONFIG,
): Readonly<AlignmentConfig> {
  const config: AlignmentConfig = {
    rateHz: overrides.rateHz ?? base.rateHz,
    maxLagSeconds: overrides.maxLagSeconds ?? base.maxLagSeconds,
    minOverlapSamples: overrides.minOverlapSamples ?? base.minOverlapSamples,
  };

  if (!Number.isFinite(config.rateHz) || config.rateHz <= 0) {
    throw new InvalidInputError("rateHz", `must be > 0, got ${config.rateHz}`);
  }
  if (!Number.isFinite(config.maxLagSeconds) || config.maxLagSeconds <= 0) {
    throw new InvalidInputError(
      "maxLagSeconds",
      `must be > 0, got ${config.maxLagSeconds}`,
    );
  }
  if (
    !Number.isInteger(config.minOverlapSamples) ||
    config.minOverlapSamples < MIN_OVERLAP_FLOOR
  ) {
    throw new InvalidInputError(
      "minOverlapSamples",
      `must be an integer >= ${MIN_OVERLAP_FLOOR}, got ${config.minOverlapSamples}`,
    );
  }

  return Object.freeze(config);
}

/** Lag window in samples at the configured rate */
export function maxLagSamples(config: Readonly<AlignmentConfig>): number {
  return Math.max(1, Math.round(config.maxLagSeconds * config.rateHz));
}
