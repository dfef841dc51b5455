/**
 * Track validation and construction from decoded columns.
 *
 * Decoders hand over column arrays (timestamp + one array per value);
 * these helpers zip them into samples and enforce the preconditions the
 * engine relies on. Violations throw {@link InvalidInputError}.
 */

import { InvalidInputError } from "./errors";
import type { AttitudeSample, PositionSample } from "./types";

function checkTimestamps(
  field: string,
  samples: readonly { timestamp: number }[],
): void {
  if (samples.length === 0) {
    throw new InvalidInputError(field, "track is empty");
  }
  for (let i = 0; i < samples.length; i++) {
    const t = samples[i].timestamp;
    if (!Number.isFinite(t)) {
      throw new InvalidInputError(field, `timestamp[${i}] is not finite`);
    }
    if (i > 0 && !(t > samples[i - 1].timestamp)) {
      throw new InvalidInputError(
        field,
        `timestamps must be strictly increasing (index ${i}: ${samples[i - 1].timestamp} → ${t})`,
      );
    }
  }
}

export function validatePositionTrack(
  field: string,
  samples: readonly PositionSample[],
): void {
  checkTimestamps(field, samples);
  const anyValid = samples.some(
    (s) =>
      Number.isFinite(s.latitude) &&
      Number.isFinite(s.longitude) &&
      Number.isFinite(s.altitude),
  );
  if (!anyValid) {
    throw new InvalidInputError(field, "every sample has a NaN coordinate");
  }
}

export function validateAttitudeTrack(
  field: string,
  samples: readonly AttitudeSample[],
): void {
  checkTimestamps(field, samples);
  if (!samples.some((s) => Number.isFinite(s.angle))) {
    throw new InvalidInputError(field, "every angle is NaN");
  }
}

function checkLengths(
  field: string,
  timestamps: ArrayLike<number>,
  columns: Record<string, ArrayLike<number>>,
): void {
  for (const [name, column] of Object.entries(columns)) {
    if (column.length !== timestamps.length) {
      throw new InvalidInputError(
        field,
        `column "${name}" has ${column.length} values for ${timestamps.length} timestamps`,
      );
    }
  }
}

export function positionTrackFromColumns(
  field: string,
  timestamps: ArrayLike<number>,
  latitude: ArrayLike<number>,
  longitude: ArrayLike<number>,
  altitude: ArrayLike<number>,
): PositionSample[] {
  checkLengths(field, timestamps, { latitude, longitude, altitude });
  const track = Array.from(timestamps, (timestamp, i) => ({
    timestamp,
    latitude: latitude[i],
    longitude: longitude[i],
    altitude: altitude[i],
  }));
  validatePositionTrack(field, track);
  return track;
}

export function attitudeTrackFromColumns(
  field: string,
  timestamps: ArrayLike<number>,
  angle: ArrayLike<number>,
): AttitudeSample[] {
  checkLengths(field, timestamps, { angle });
  const track = Array.from(timestamps, (timestamp, i) => ({
    timestamp,
    angle: angle[i],
  }));
  validateAttitudeTrack(field, track);
  return track;
}
