/**
 * alignmentProperties.test.ts - End-to-end offset recovery
 *
 * Synthetic tracks with known lags. The target always lags the reference:
 * target(t) = reference(t − Δ), and the engine must report Δ.
 *
 * The signals are slow, with periods close to the track duration, as a
 * drone survey pattern is. Their half period exceeds the default 10 s lag
 * window, so the window holds a single lobe.
 *
 * Run with: npm test -- alignmentProperties
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as THREE from "three";
import { AlignmentEngine } from "../alignment/AlignmentEngine";
import {
  attitudeTrack,
  positionTrack,
  sampleTimes,
} from "../utils/SyntheticTracks";

const RATE_HZ = 100;
const RESAMPLE_PERIOD = 1 / RATE_HZ;

// 45 s and 50 s periods, 10° and 8° amplitude
const pitchAt = (t: number) => 10 * Math.sin((2 * Math.PI * t) / 45 + 1);
const rollAt = (t: number) => 8 * Math.sin((2 * Math.PI * t) / 50 + 0.4);

describe("alignment properties", () => {
  const engine = new AlignmentEngine({ rateHz: RATE_HZ });
  const times = sampleTimes(60, RATE_HZ);

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("synthetic offset recovery", () => {
    const delay = 0.37;
    const reference = attitudeTrack(times, pitchAt, { noiseStd: 0.05, seed: 11 });
    const target = attitudeTrack(times, (t) => pitchAt(t - delay), {
      noiseStd: 0.05,
      seed: 12,
    });

    it("recovers the lag within one resampling period", () => {
      const result = engine.alignAttitude(reference, target);

      expect(result.status).toBe("OK");
      expect(result.timeOffsetSeconds).not.toBeNull();
      expect(Math.abs((result.timeOffsetSeconds ?? NaN) - delay)).toBeLessThan(
        RESAMPLE_PERIOD,
      );
      expect(result.quality).toBeGreaterThan(0.95);
    });

    it.each([40, 60])(
      "recovers the lag of a %i s period without bias",
      (periodS) => {
        const angleAt = (t: number) =>
          12 * Math.sin((2 * Math.PI * t) / periodS + 0.5);
        const result = engine.alignAttitude(
          attitudeTrack(times, angleAt),
          attitudeTrack(times, (t) => angleAt(t - delay)),
        );

        expect(result.status).toBe("OK");
        expect(
          Math.abs((result.timeOffsetSeconds ?? NaN) - delay),
        ).toBeLessThan(RESAMPLE_PERIOD);
      },
    );

    it("negates the offset when reference and target swap", () => {
      const forward = engine.alignAttitude(reference, target);
      const backward = engine.alignAttitude(target, reference);

      expect(backward.status).toBe("OK");
      expect(backward.timeOffsetSeconds).toBeCloseTo(
        -(forward.timeOffsetSeconds ?? NaN),
        9,
      );
    });
  });

  it("aligns a track with itself at zero offset and full quality", () => {
    const track = attitudeTrack(times, pitchAt, { noiseStd: 0.05, seed: 3 });
    const result = engine.alignAttitude(track, track);

    expect(result.status).toBe("OK");
    expect(result.timeOffsetSeconds).toBeCloseTo(0, 10);
    expect(result.quality).toBeCloseTo(1, 10);
  });

  it("reports tracks whose time spans do not intersect", () => {
    const early = attitudeTrack(sampleTimes(10, RATE_HZ), pitchAt);
    const late = attitudeTrack(sampleTimes(10, RATE_HZ, 20), pitchAt);
    const result = engine.alignAttitude(early, late);

    expect(result.status).toBe("INSUFFICIENT_OVERLAP");
    expect(result.timeOffsetSeconds).toBeNull();
    expect(result.perAxis).toEqual({});
  });

  it("reports a constant track as degenerate", () => {
    const flat = attitudeTrack(times, () => 4.5);
    const moving = attitudeTrack(times, pitchAt);
    const result = engine.alignAttitude(flat, moving);

    expect(result.status).toBe("DEGENERATE_SIGNAL");
    expect(result.timeOffsetSeconds).toBeNull();
    expect(result.perAxis.pitch).toEqual({
      status: "DEGENERATE_SIGNAL",
      reason: "zero-variance",
    });
  });

  it("sums the two stages of a chained alignment", () => {
    const d1 = 0.37;
    const d2 = -0.12;

    // A: reference, B: intermediate, C: target
    const pitchA = attitudeTrack(times, pitchAt);
    const pitchB = attitudeTrack(times, (t) => pitchAt(t - d1));
    const rollB = attitudeTrack(times, rollAt);
    const rollC = attitudeTrack(times, (t) => rollAt(t - d2));

    const chained = engine.alignChained(
      { kind: "attitude", reference: pitchA, target: pitchB, axis: "pitch" },
      { kind: "attitude", reference: rollB, target: rollC, axis: "roll" },
    );

    expect(chained.status).toBe("OK");
    expect(chained.stage1.status).toBe("OK");
    expect(chained.stage2?.status).toBe("OK");
    expect(Math.abs((chained.timeOffsetSeconds ?? NaN) - (d1 + d2))).toBeLessThan(
      0.02,
    );
  });

  describe("10 Hz GNSS scenario", () => {
    const origin = { latitude: 46.2, longitude: 6.15, altitude: 120 };
    const shift = 0.215;
    // Level flight, slow sinusoidal horizontal path (40 s east, 50 s north)
    const pathAt = (t: number) =>
      new THREE.Vector3(
        40 * Math.sin((2 * Math.PI * t) / 40),
        30 * Math.sin((2 * Math.PI * t) / 50 + 0.7),
        0,
      );
    const gnssTimes = sampleTimes(60, 10);
    const reference = positionTrack(origin, gnssTimes, pathAt);
    const target = positionTrack(origin, gnssTimes, (t) => pathAt(t - shift));

    it("recovers the shift from the horizontal axes", () => {
      const result = engine.alignPositions(reference, target);

      expect(result.status).toBe("OK");
      const offset = result.timeOffsetSeconds ?? NaN;
      expect(offset).toBeGreaterThanOrEqual(0.2);
      expect(offset).toBeLessThanOrEqual(0.23);
      expect(result.quality).toBeGreaterThan(0.9);
      expect(result.residualSpatialOffsetM).not.toBeNull();
      expect(result.residualSpatialOffsetM ?? Infinity).toBeLessThan(1.0);
    });

    it("leaves the flat vertical axis out of the fusion", () => {
      const result = engine.alignPositions(reference, target);

      expect(result.perAxis.up).toEqual({
        status: "DEGENERATE_SIGNAL",
        reason: "zero-variance",
      });
      expect(result.perAxis.east.status).toBe("OK");
      expect(result.perAxis.north.status).toBe("OK");
    });

    it("recovers the shift on each horizontal axis", () => {
      const result = engine.alignPositions(reference, target);

      for (const axis of ["east", "north"]) {
        const correlation = result.perAxis[axis];
        expect(correlation.status).toBe("OK");
        if (correlation.status === "OK") {
          expect(Math.abs(correlation.tauSeconds - shift)).toBeLessThan(
            RESAMPLE_PERIOD,
          );
        }
      }
    });
  });
});
