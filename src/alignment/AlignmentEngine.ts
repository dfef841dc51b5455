/**
 * Alignment Engine
 * ================
 *
 * Public entry points of the cross-correlation time alignment:
 *
 *   Position (E/N/U): project → resample → correlate ×3 → fuse → residual
 *   Attitude (1 axis): resample → correlate → (no fusion, no residual)
 *   Chained: two alignments through a shared intermediate clock, summed
 *
 * Each call walks the phases
 *   init → projected → resampled → correlated → fused → done
 * and exits to `failed` on INSUFFICIENT_OVERLAP or DEGENERATE_SIGNAL.
 * Those are reported in the result; malformed input throws
 * InvalidInputError.
 *
 * The engine holds only its frozen config, so calls are independent and
 * free of side effects (apart from logging).
 *
 * @module AlignmentEngine
 */

import { alignLog } from "../lib/logger";
import { firstValidGeoPoint, projectToEnu } from "../lib/geo/enuProjection";
import { correlate } from "../lib/signal/crossCorrelation";
import { locatePeak } from "../lib/signal/peakInterpolation";
import { resample } from "../lib/signal/resample";
import { periodicAmbiguity } from "../lib/signal/spectrum";
import {
  type AlignmentConfig,
  maxLagSamples,
  resolveAlignmentConfig,
} from "./config";
import { InvalidInputError } from "./errors";
import { fuseAxisOffsets } from "./offsetFusion";
import { residualSpatialOffset } from "./residual";
import { validateAttitudeTrack, validatePositionTrack } from "./tracks";
import type {
  AlignmentPhase,
  AlignmentRequest,
  AlignmentResult,
  AlignmentStatus,
  AttitudeSample,
  ChainedAlignmentResult,
  CorrelationResult,
  PositionSample,
} from "./types";

// ============================================================================
// CONSTANTS
// ============================================================================

export const POSITION_AXES = ["east", "north", "up"] as const;
export const DEFAULT_ATTITUDE_AXIS = "pitch";

// ============================================================================
// PHASE TRAIL
// ============================================================================

class PhaseTrail {
  private readonly phases: AlignmentPhase[] = ["init"];

  advance(phase: AlignmentPhase): void {
    this.phases.push(phase);
  }

  fail(
    status: Exclude<AlignmentStatus, "OK">,
    perAxis: Record<string, CorrelationResult> = {},
  ): AlignmentResult {
    this.phases.push("failed");
    return freezeResult({
      status,
      timeOffsetSeconds: null,
      quality: 0,
      perAxis,
      residualSpatialOffsetM: null,
      phases: this.phases,
    });
  }

  done(
    timeOffsetSeconds: number,
    quality: number,
    perAxis: Record<string, CorrelationResult>,
    residualSpatialOffsetM: number | null,
  ): AlignmentResult {
    this.phases.push("done");
    return freezeResult({
      status: "OK",
      timeOffsetSeconds,
      quality,
      perAxis,
      residualSpatialOffsetM,
      phases: this.phases,
    });
  }
}

function freezeResult(result: AlignmentResult): AlignmentResult {
  for (const axis of Object.values(result.perAxis)) Object.freeze(axis);
  Object.freeze(result.perAxis);
  Object.freeze(result.phases);
  return Object.freeze(result);
}

// ============================================================================
// ENGINE
// ============================================================================

export class AlignmentEngine {
  readonly config: Readonly<AlignmentConfig>;

  constructor(config: Partial<AlignmentConfig> = {}) {
    this.config = resolveAlignmentConfig(config);
  }

  /**
   * Dispatch on the request kind.
   */
  align(
    request: AlignmentRequest,
    overrides?: Partial<AlignmentConfig>,
  ): AlignmentResult {
    switch (request.kind) {
      case "position":
        return this.alignPositions(request.reference, request.target, overrides);
      case "attitude":
        return this.alignAttitude(
          request.reference,
          request.target,
          request.axis,
          overrides,
        );
    }
  }

  /**
   * Three-axis alignment of two GNSS tracks. Both are projected around the
   * reference's first valid fix.
   */
  alignPositions(
    reference: readonly PositionSample[],
    target: readonly PositionSample[],
    overrides?: Partial<AlignmentConfig>,
  ): AlignmentResult {
    validatePositionTrack("reference", reference);
    validatePositionTrack("target", target);
    const config = this.resolve(overrides);
    const trail = new PhaseTrail();

    const origin = firstValidGeoPoint(reference);
    if (!origin) {
      throw new InvalidInputError("reference", "no fix with finite coordinates");
    }
    const enuRef = projectToEnu(origin, reference);
    const enuTgt = projectToEnu(origin, target);
    trail.advance("projected");

    const tRef = reference.map((s) => s.timestamp);
    const tTgt = target.map((s) => s.timestamp);
    const grid = resample(
      tRef,
      [enuRef.map((v) => v.x), enuRef.map((v) => v.y), enuRef.map((v) => v.z)],
      tTgt,
      [enuTgt.map((v) => v.x), enuTgt.map((v) => v.y), enuTgt.map((v) => v.z)],
      config.rateHz,
      config.minOverlapSamples,
    );
    if (grid.status !== "OK") {
      alignLog.info(
        `Position tracks overlap in ${grid.overlapSamples} samples (< ${config.minOverlapSamples})`,
      );
      return trail.fail("INSUFFICIENT_OVERLAP");
    }
    trail.advance("resampled");

    const perAxis: Record<string, CorrelationResult> = {};
    POSITION_AXES.forEach((axis, i) => {
      perAxis[axis] = this.correlateAxis(axis, grid.a[i], grid.b[i], config);
    });
    trail.advance("correlated");

    const fused = fuseAxisOffsets(perAxis);
    if (fused.status !== "OK") {
      alignLog.info("All position axes degenerate");
      return trail.fail("DEGENERATE_SIGNAL", perAxis);
    }
    trail.advance("fused");

    const residual = residualSpatialOffset(
      tRef,
      enuRef,
      tTgt,
      enuTgt,
      fused.timeOffsetSeconds,
    );

    alignLog.debug("Position alignment", {
      offset: fused.timeOffsetSeconds,
      quality: fused.quality,
      axes: fused.axesUsed,
      residual,
    });

    return trail.done(fused.timeOffsetSeconds, fused.quality, perAxis, residual);
  }

  /**
   * Single-axis alignment of two angle series (degrees).
   */
  alignAttitude(
    reference: readonly AttitudeSample[],
    target: readonly AttitudeSample[],
    axis: string = DEFAULT_ATTITUDE_AXIS,
    overrides?: Partial<AlignmentConfig>,
  ): AlignmentResult {
    validateAttitudeTrack("reference", reference);
    validateAttitudeTrack("target", target);
    const config = this.resolve(overrides);
    const trail = new PhaseTrail();

    const grid = resample(
      reference.map((s) => s.timestamp),
      [reference.map((s) => s.angle)],
      target.map((s) => s.timestamp),
      [target.map((s) => s.angle)],
      config.rateHz,
      config.minOverlapSamples,
    );
    if (grid.status !== "OK") {
      alignLog.info(
        `Attitude tracks overlap in ${grid.overlapSamples} samples (< ${config.minOverlapSamples})`,
      );
      return trail.fail("INSUFFICIENT_OVERLAP");
    }
    trail.advance("resampled");

    const result = this.correlateAxis(axis, grid.a[0], grid.b[0], config);
    const perAxis: Record<string, CorrelationResult> = { [axis]: result };
    trail.advance("correlated");

    if (result.status !== "OK") {
      return trail.fail("DEGENERATE_SIGNAL", perAxis);
    }

    return trail.done(result.tauSeconds, Math.abs(result.score), perAxis, null);
  }

  /**
   * Align target to reference through an intermediate clock.
   *
   * `stage1` relates reference ↔ intermediate, `stage2` intermediate ↔
   * target; the offsets add up. Stops at the first stage that is not OK.
   */
  alignChained(
    stage1: AlignmentRequest,
    stage2: AlignmentRequest,
    overrides?: Partial<AlignmentConfig>,
  ): ChainedAlignmentResult {
    const first = this.align(stage1, overrides);
    if (first.status !== "OK" || first.timeOffsetSeconds === null) {
      return Object.freeze({
        status: first.status,
        timeOffsetSeconds: null,
        stage1: first,
        stage2: null,
      });
    }

    const second = this.align(stage2, overrides);
    if (second.status !== "OK" || second.timeOffsetSeconds === null) {
      return Object.freeze({
        status: second.status,
        timeOffsetSeconds: null,
        stage1: first,
        stage2: second,
      });
    }

    return Object.freeze({
      status: "OK",
      timeOffsetSeconds: first.timeOffsetSeconds + second.timeOffsetSeconds,
      stage1: first,
      stage2: second,
    });
  }

  // --------------------------------------------------------------------------

  private resolve(overrides?: Partial<AlignmentConfig>): Readonly<AlignmentConfig> {
    return overrides ? resolveAlignmentConfig(overrides, this.config) : this.config;
  }

  private correlateAxis(
    axis: string,
    reference: Float64Array,
    target: Float64Array,
    config: Readonly<AlignmentConfig>,
  ): CorrelationResult {
    const axisLog = alignLog.child(axis);
    const correlation = correlate(reference, target, maxLagSamples(config));
    if (correlation.status !== "OK") {
      axisLog.debug("zero-variance signal");
      return { status: "DEGENERATE_SIGNAL", reason: correlation.reason };
    }

    const peak = locatePeak(correlation.lags, correlation.scores, config.rateHz);
    if (peak.status !== "OK") {
      axisLog.debug("correlation peak on the lag window edge");
      return peak;
    }

    if (peak.score < 0) {
      axisLog.warn(
        `negative correlation peak (${peak.score.toFixed(3)}), offset kept`,
      );
    }

    const periodicity = periodicAmbiguity(reference, config.rateHz, peak.tauSeconds);
    if (periodicity.ambiguous) {
      axisLog.warn(
        `peak at ${peak.tauSeconds.toFixed(3)} s lies beyond a quarter of the ${periodicity.dominantPeriodS.toFixed(2)} s dominant period`,
      );
    }

    axisLog.debug("Correlated axis", {
      tau: peak.tauSeconds,
      score: peak.score,
    });
    return peak;
  }
}
