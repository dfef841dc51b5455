import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  EARTH_RADIUS_M,
  enuToGeodetic,
  firstValidGeoPoint,
  projectToEnu,
} from "./enuProjection";

const ORIGIN = { latitude: 46.5, longitude: 7.25, altitude: 500 };

describe("projectToEnu", () => {
  it("maps the origin to (0, 0, 0)", () => {
    const [enu] = projectToEnu(ORIGIN, [ORIGIN]);
    expect(enu.x).toBe(0);
    expect(enu.y).toBe(0);
    expect(enu.z).toBe(0);
  });

  it("scales a latitude step by the Earth radius", () => {
    const [enu] = projectToEnu(ORIGIN, [
      { latitude: 46.501, longitude: 7.25, altitude: 510 },
    ]);
    expect(enu.x).toBe(0);
    expect(enu.y).toBeCloseTo(EARTH_RADIUS_M * 0.001 * (Math.PI / 180), 4);
    expect(enu.z).toBeCloseTo(10, 9);
  });

  it("shrinks a longitude step by cos(origin latitude)", () => {
    const origin = { latitude: 60, longitude: 10, altitude: 0 };
    const [enu] = projectToEnu(origin, [
      { latitude: 60, longitude: 10.001, altitude: 0 },
    ]);
    // 111.19492664 m per millidegree, halved at 60°
    expect(enu.x).toBeCloseTo(55.5974633, 4);
    expect(enu.y).toBe(0);
  });

  it("propagates NaN coordinates", () => {
    const [enu] = projectToEnu(ORIGIN, [
      { latitude: NaN, longitude: 7.251, altitude: 500 },
    ]);
    expect(Number.isNaN(enu.y)).toBe(true);
    expect(Number.isFinite(enu.x)).toBe(true);
  });

  it("inverts enuToGeodetic", () => {
    const offset = new THREE.Vector3(250.5, -120.25, 33);
    const [enu] = projectToEnu(ORIGIN, [enuToGeodetic(ORIGIN, offset)]);
    expect(enu.x).toBeCloseTo(250.5, 6);
    expect(enu.y).toBeCloseTo(-120.25, 6);
    expect(enu.z).toBeCloseTo(33, 9);
  });
});

describe("firstValidGeoPoint", () => {
  it("skips fixes with a NaN coordinate", () => {
    const origin = firstValidGeoPoint([
      { latitude: NaN, longitude: 7, altitude: 1 },
      { latitude: 46, longitude: 7, altitude: 2 },
    ]);
    expect(origin).toEqual({ latitude: 46, longitude: 7, altitude: 2 });
  });

  it("returns null when no fix is valid", () => {
    expect(
      firstValidGeoPoint([{ latitude: 46, longitude: 7, altitude: NaN }]),
    ).toBeNull();
  });
});
