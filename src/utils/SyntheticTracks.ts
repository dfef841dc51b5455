import * as THREE from "three";
import { enuToGeodetic } from "../lib/geo/enuProjection";
import type {
  AttitudeSample,
  GeoPoint,
  PositionSample,
} from "../alignment/types";

/**
 * Synthetic Tracks
 * ================
 *
 * Deterministic GNSS and attitude tracks for tests and demos. Noise comes
 * from a seeded generator so every run produces the same samples.
 */

/** mulberry32 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Box-Muller on a seeded uniform source */
export function seededGaussian(seed: number): () => number {
  const uniform = seededRandom(seed);
  return () => {
    const u1 = Math.max(uniform(), Number.EPSILON);
    const u2 = uniform();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

/**
 * start, start + 1/rate, … covering `durationS` (both ends included).
 */
export function sampleTimes(
  durationS: number,
  rateHz: number,
  start = 0,
): number[] {
  const count = Math.round(durationS * rateHz) + 1;
  return Array.from({ length: count }, (_, k) => start + k / rateHz);
}

export interface NoiseOptions {
  /** Gaussian standard deviation (same unit as the signal) */
  noiseStd?: number;
  seed?: number;
}

export function attitudeTrack(
  times: readonly number[],
  angleAt: (t: number) => number,
  { noiseStd = 0, seed = 1 }: NoiseOptions = {},
): AttitudeSample[] {
  const noise = seededGaussian(seed);
  return times.map((timestamp) => ({
    timestamp,
    angle: angleAt(timestamp) + noiseStd * noise(),
  }));
}

export function positionTrack(
  origin: GeoPoint,
  times: readonly number[],
  enuAt: (t: number) => THREE.Vector3,
  { noiseStd = 0, seed = 1 }: NoiseOptions = {},
): PositionSample[] {
  const noise = seededGaussian(seed);
  return times.map((timestamp) => {
    const enu = enuAt(timestamp).add(
      new THREE.Vector3(noise(), noise(), noise()).multiplyScalar(noiseStd),
    );
    return { timestamp, ...enuToGeodetic(origin, enu) };
  });
}
