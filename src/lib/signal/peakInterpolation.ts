/**
 * Sub-sample peak location by parabolic interpolation.
 *
 * The peak is the lag maximizing |score| (ties go to the smallest lag);
 * the three |score| values around it are fitted with a parabola:
 *
 *   δ = (y1 − y3) / (2 · (y1 − 2·y2 + y3))
 *
 * A peak on either edge of the lag window is not bracketed and is
 * reported as degenerate.
 */

import type { CorrelationResult } from "../../alignment/types";
import { InvalidInputError } from "../../alignment/errors";

export function parabolicOffset(y1: number, y2: number, y3: number): number {
  const denom = y1 - 2 * y2 + y3;
  if (denom === 0) return 0;
  return (y1 - y3) / (2 * denom);
}

export function locatePeak(
  lags: ArrayLike<number>,
  scores: ArrayLike<number>,
  rateHz: number,
): CorrelationResult {
  const n = scores.length;
  if (lags.length !== n || n === 0) {
    throw new InvalidInputError(
      "scores",
      `expected ${lags.length} scores, got ${n}`,
    );
  }

  let peak = 0;
  for (let i = 1; i < n; i++) {
    if (Math.abs(scores[i]) > Math.abs(scores[peak])) peak = i;
  }

  if (peak === 0 || peak === n - 1) {
    return { status: "DEGENERATE_SIGNAL", reason: "peak-at-window-edge" };
  }

  const delta = parabolicOffset(
    Math.abs(scores[peak - 1]),
    Math.abs(scores[peak]),
    Math.abs(scores[peak + 1]),
  );

  return {
    status: "OK",
    lagSamples: lags[peak],
    subSampleOffset: delta,
    tauSeconds: (lags[peak] + delta) / rateHz,
    score: scores[peak],
  };
}
