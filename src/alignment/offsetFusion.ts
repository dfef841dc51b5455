/**
 * Confidence-weighted fusion of per-axis offsets.
 *
 *   offset  = Σ |s_i| · τ_i / Σ |s_i|
 *   quality = mean |s_i|
 *
 * over the axes whose correlation is OK. Degenerate axes are left out.
 */

import type { AxisCorrelation, CorrelationResult } from "./types";

export type FusedOffset =
  | { status: "OK"; timeOffsetSeconds: number; quality: number; axesUsed: string[] }
  | { status: "DEGENERATE_SIGNAL" };

export function fuseAxisOffsets(
  perAxis: Readonly<Record<string, CorrelationResult>>,
): FusedOffset {
  const valid = Object.entries(perAxis).filter(
    (entry): entry is [string, AxisCorrelation] => entry[1].status === "OK",
  );

  let weightSum = 0;
  let weighted = 0;
  for (const [, axis] of valid) {
    const w = Math.abs(axis.score);
    weightSum += w;
    weighted += w * axis.tauSeconds;
  }

  // All axes degenerate, or only zero-weight peaks left
  if (valid.length === 0 || weightSum === 0) {
    return { status: "DEGENERATE_SIGNAL" };
  }

  return {
    status: "OK",
    timeOffsetSeconds: weighted / weightSum,
    quality: weightSum / valid.length,
    axesUsed: valid.map(([name]) => name),
  };
}
