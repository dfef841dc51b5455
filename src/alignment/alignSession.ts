/**
 * Payload session alignment
 * =========================
 *
 * A payload carries a variable set of sensors. Each one is an optional
 * field rather than a dynamically attached attribute; a missing sensor is
 * simply absent and comes back as `skipped`.
 *
 * Clocks:
 *   - reference: drone platform (GNSS, optionally the platform gimbal pitch)
 *   - payload:   payload GNSS and the payload gimbal log share one clock
 *   - inclinometer: its own clock, no GNSS fix
 *
 * Streams:
 *   payloadGnss  position alignment, reference GNSS ↔ payload GNSS
 *   gimbal       attitude alignment, platform pitch ↔ payload gimbal pitch
 *   inclinometer chained: reference GNSS ↔ payload GNSS, then
 *                payload gimbal pitch ↔ inclinometer pitch
 *
 * A stream that fails (by status or by InvalidInputError) is reported and
 * never stops the remaining streams.
 *
 * @module alignSession
 */

import { sessionLog } from "../lib/logger";
import type { AlignmentEngine } from "./AlignmentEngine";
import { isInvalidInputError } from "./errors";
import type {
  AlignmentResult,
  AttitudeSample,
  ChainedAlignmentResult,
  PositionSample,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ReferenceTracks {
  gnss: readonly PositionSample[];
  /** Gimbal pitch as logged by the platform, on the reference clock */
  gimbalPitch?: readonly AttitudeSample[];
}

export interface PayloadTracks {
  gnss?: readonly PositionSample[];
  gimbalPitch?: readonly AttitudeSample[];
  inclinometerPitch?: readonly AttitudeSample[];
}

export type PayloadStream = "payloadGnss" | "gimbal" | "inclinometer";

export type StreamAlignment =
  | {
      outcome: "aligned";
      timeOffsetSeconds: number;
      result: AlignmentResult | ChainedAlignmentResult;
    }
  | { outcome: "failed"; result: AlignmentResult | ChainedAlignmentResult }
  | { outcome: "invalid"; error: string }
  | { outcome: "skipped"; reason: string };

export type SessionAlignment = Record<PayloadStream, StreamAlignment>;

// ============================================================================
// SESSION
// ============================================================================

function run(
  stream: PayloadStream,
  task: () => AlignmentResult | ChainedAlignmentResult,
): StreamAlignment {
  try {
    const result = task();
    if (result.status === "OK" && result.timeOffsetSeconds !== null) {
      sessionLog.info(
        `${stream}: offset ${result.timeOffsetSeconds.toFixed(4)} s`,
      );
      return { outcome: "aligned", timeOffsetSeconds: result.timeOffsetSeconds, result };
    }
    sessionLog.warn(`${stream}: alignment failed (${result.status}), stream skipped`);
    return { outcome: "failed", result };
  } catch (err) {
    if (isInvalidInputError(err)) {
      sessionLog.error(`${stream}: ${err.message}`);
      return { outcome: "invalid", error: err.message };
    }
    throw err;
  }
}

function skipped(reason: string): StreamAlignment {
  return { outcome: "skipped", reason };
}

/**
 * Align every secondary stream present in `payload` against `reference`.
 */
export function alignPayload(
  engine: AlignmentEngine,
  reference: ReferenceTracks,
  payload: PayloadTracks,
): SessionAlignment {
  const { gnss, gimbalPitch, inclinometerPitch } = payload;

  const payloadGnss = gnss
    ? run("payloadGnss", () => engine.alignPositions(reference.gnss, gnss))
    : skipped("no payload GNSS track");

  let gimbal: StreamAlignment;
  if (!gimbalPitch) {
    gimbal = skipped("no payload gimbal log");
  } else if (reference.gimbalPitch) {
    const platformPitch = reference.gimbalPitch;
    gimbal = run("gimbal", () =>
      engine.alignAttitude(platformPitch, gimbalPitch, "pitch"),
    );
  } else if (payloadGnss.outcome === "aligned") {
    // Same clock as the payload GNSS
    gimbal = payloadGnss;
  } else {
    gimbal = skipped("no platform pitch and payload GNSS not aligned");
  }

  let inclinometer: StreamAlignment;
  if (!inclinometerPitch) {
    inclinometer = skipped("no inclinometer track");
  } else if (!gnss || !gimbalPitch) {
    inclinometer = skipped("chain needs payload GNSS and gimbal log");
  } else {
    inclinometer = run("inclinometer", () =>
      engine.alignChained(
        { kind: "position", reference: reference.gnss, target: gnss },
        {
          kind: "attitude",
          reference: gimbalPitch,
          target: inclinometerPitch,
          axis: "pitch",
        },
      ),
    );
  }

  return { payloadGnss, gimbal, inclinometer };
}
