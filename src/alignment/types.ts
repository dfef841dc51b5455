/**
 * Alignment Types
 * ===============
 *
 * Input tracks, per-axis correlation outcomes and the result records
 * returned by the alignment engine.
 *
 * Sign convention: `timeOffsetSeconds = Δ` when `target(t) = reference(t − Δ)`,
 * i.e. the target lags the reference by Δ seconds. Subtract Δ from a target
 * timestamp to express it on the reference clock.
 *
 * @module alignment/types
 */

import type * as THREE from "three";

// ============================================================================
// INPUT TRACKS
// ============================================================================

/** Geodetic coordinate (degrees, degrees, metres) */
export interface GeoPoint {
  latitude: number;
  longitude: number;
  altitude: number;
}

/** One GNSS fix, timestamp in seconds */
export interface PositionSample extends GeoPoint {
  timestamp: number;
}

/** One attitude reading (pitch, roll…) in degrees, timestamp in seconds */
export interface AttitudeSample {
  timestamp: number;
  angle: number;
}

/** East-North-Up offset from the projection origin (x = E, y = N, z = U) */
export type EnuTriple = THREE.Vector3;

// ============================================================================
// STATUS
// ============================================================================

export type AlignmentStatus =
  | "OK"
  | "INSUFFICIENT_OVERLAP"
  | "DEGENERATE_SIGNAL";

export type AlignmentPhase =
  | "init"
  | "projected"
  | "resampled"
  | "correlated"
  | "fused"
  | "done"
  | "failed";

// ============================================================================
// PER-AXIS CORRELATION
// ============================================================================

export interface AxisCorrelation {
  status: "OK";
  /** Integer lag of the correlation peak, in resampled samples */
  lagSamples: number;
  /** Parabolic refinement δ ∈ (-0.5, 0.5) */
  subSampleOffset: number;
  /** (lagSamples + δ) / rateHz */
  tauSeconds: number;
  /** Signed normalized score at the peak, ∈ [-1, 1] */
  score: number;
}

export interface DegenerateAxis {
  status: "DEGENERATE_SIGNAL";
  reason: "zero-variance" | "peak-at-window-edge";
}

export type CorrelationResult = AxisCorrelation | DegenerateAxis;

// ============================================================================
// RESULTS
// ============================================================================

export interface AlignmentResult {
  readonly status: AlignmentStatus;
  /** null unless status is OK */
  readonly timeOffsetSeconds: number | null;
  /** Fused confidence ∈ [0, 1]; 0 when no offset was produced */
  readonly quality: number;
  readonly perAxis: Readonly<Record<string, CorrelationResult>>;
  /** Position alignment only; null for attitude or failed calls */
  readonly residualSpatialOffsetM: number | null;
  /** Phases the call went through, last entry is "done" or "failed" */
  readonly phases: readonly AlignmentPhase[];
}

export interface ChainedAlignmentResult {
  readonly status: AlignmentStatus;
  /** stage1 + stage2 offsets; null when either stage failed */
  readonly timeOffsetSeconds: number | null;
  readonly stage1: AlignmentResult;
  /** null when stage 1 failed and stage 2 was never run */
  readonly stage2: AlignmentResult | null;
}

// ============================================================================
// REQUESTS
// ============================================================================

export interface PositionAlignmentRequest {
  kind: "position";
  reference: readonly PositionSample[];
  target: readonly PositionSample[];
}

export interface AttitudeAlignmentRequest {
  kind: "attitude";
  reference: readonly AttitudeSample[];
  target: readonly AttitudeSample[];
  /** Name used as the key in `perAxis` (default "pitch") */
  axis?: string;
}

export type AlignmentRequest =
  | PositionAlignmentRequest
  | AttitudeAlignmentRequest;
