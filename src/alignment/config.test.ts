import { describe, it, expect } from "vitest";
import {
  DEFAULT_ALIGNMENT_CONFIG,
  maxLagSamples,
  resolveAlignmentConfig,
} from "./config";
import { InvalidInputError } from "./errors";

describe("resolveAlignmentConfig", () => {
  it("fills in the defaults", () => {
    expect(resolveAlignmentConfig()).toEqual({
      rateHz: 100,
      maxLagSeconds: 10,
      minOverlapSamples: 8,
    });
    expect(Object.isFrozen(DEFAULT_ALIGNMENT_CONFIG)).toBe(true);
  });

  it("layers overrides on a base config", () => {
    const base = resolveAlignmentConfig({ rateHz: 50 });
    const config = resolveAlignmentConfig({ maxLagSeconds: 2 }, base);
    expect(config).toEqual({ rateHz: 50, maxLagSeconds: 2, minOverlapSamples: 8 });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each([
    [{ rateHz: 0 }, "rateHz"],
    [{ rateHz: Number.NaN }, "rateHz"],
    [{ maxLagSeconds: -1 }, "maxLagSeconds"],
    [{ minOverlapSamples: 2 }, "minOverlapSamples"],
    [{ minOverlapSamples: 8.5 }, "minOverlapSamples"],
  ])("rejects %o", (overrides, field) => {
    try {
      resolveAlignmentConfig(overrides);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.field).toBe(field);
        expect(err.code).toBe("INVALID_INPUT");
      }
    }
  });
});

describe("maxLagSamples", () => {
  it("converts the window to samples", () => {
    expect(maxLagSamples(DEFAULT_ALIGNMENT_CONFIG)).toBe(1000);
    expect(maxLagSamples({ rateHz: 10, maxLagSeconds: 0.25, minOverlapSamples: 8 })).toBe(3);
  });
});
