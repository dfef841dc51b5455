/**
 * Bounded normalized cross-correlation
 * ====================================
 *
 * For each lag τ ∈ [−L, +L] the score is the Pearson coefficient of the
 * overlapping slices x[t], y[t+τ]:
 *
 *   score[τ] = Σ (x − x̄ₒ)(y − ȳₒ) / sqrt(Σ (x − x̄ₒ)² · Σ (y − ȳₒ)²)
 *
 * with x̄ₒ, ȳₒ the means of the overlap only, so the score stays in
 * [−1, 1] at every lag and does not shrink with the overlap. A slice
 * with no variance scores 0. The window is clamped to ⌊N/2⌋ so every
 * score rests on at least half of the samples.
 *
 * Cost is O(N · L).
 *
 * @module crossCorrelation
 */

import { InvalidInputError } from "../../alignment/errors";

export interface CrossCorrelation {
  status: "OK";
  /** −L … +L */
  lags: Int32Array;
  scores: Float64Array;
}

export interface DegenerateCorrelation {
  status: "DEGENERATE_SIGNAL";
  reason: "zero-variance";
}

export type CorrelationOutcome = CrossCorrelation | DegenerateCorrelation;

/** Variance floor, relative to max(1, mean²) */
export const DEGENERATE_VARIANCE = 1e-12;

function isFlat(variance: number, mean: number): boolean {
  return !(variance > DEGENERATE_VARIANCE * Math.max(1, mean * mean));
}

function meanOf(signal: ArrayLike<number>, from: number, to: number): number {
  let sum = 0;
  for (let i = from; i < to; i++) sum += signal[i];
  return sum / (to - from);
}

function varianceOf(
  signal: ArrayLike<number>,
  from: number,
  to: number,
  mean: number,
): number {
  let acc = 0;
  for (let i = from; i < to; i++) {
    const v = signal[i] - mean;
    acc += v * v;
  }
  return acc / (to - from);
}

/**
 * Pearson coefficient of x[from, to) against y[from + lag, to + lag).
 */
function overlapScore(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  from: number,
  to: number,
  lag: number,
): number {
  const mx = meanOf(x, from, to);
  const my = meanOf(y, from + lag, to + lag);

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let t = from; t < to; t++) {
    const dx = x[t] - mx;
    const dy = y[t + lag] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  const count = to - from;
  if (isFlat(sxx / count, mx) || isFlat(syy / count, my)) return 0;
  return Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
}

/**
 * Correlate two equal-length, equally spaced signals over lags
 * [−maxLagSamples, +maxLagSamples] (clamped to ⌊N/2⌋).
 */
export function correlate(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  maxLagSamples: number,
): CorrelationOutcome {
  const n = x.length;
  if (y.length !== n) {
    throw new InvalidInputError(
      "signals",
      `length mismatch (${n} vs ${y.length})`,
    );
  }
  if (n < 2) {
    throw new InvalidInputError("signals", `need at least 2 samples, got ${n}`);
  }
  if (!Number.isInteger(maxLagSamples) || maxLagSamples < 1) {
    throw new InvalidInputError(
      "maxLagSamples",
      `must be a positive integer, got ${maxLagSamples}`,
    );
  }

  const xMean = meanOf(x, 0, n);
  const yMean = meanOf(y, 0, n);
  if (
    isFlat(varianceOf(x, 0, n, xMean), xMean) ||
    isFlat(varianceOf(y, 0, n, yMean), yMean)
  ) {
    return { status: "DEGENERATE_SIGNAL", reason: "zero-variance" };
  }

  const maxLag = Math.min(maxLagSamples, Math.floor(n / 2));
  const size = 2 * maxLag + 1;
  const lags = new Int32Array(size);
  const scores = new Float64Array(size);

  for (let k = 0; k < size; k++) {
    const lag = k - maxLag;
    lags[k] = lag;
    scores[k] = overlapScore(x, y, Math.max(0, -lag), Math.min(n, n - lag), lag);
  }

  return { status: "OK", lags, scores };
}
