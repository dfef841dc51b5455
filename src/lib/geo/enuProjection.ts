/**
 * Local ENU Projection
 * ====================
 *
 * Equirectangular tangent-plane approximation around an origin:
 *
 *   E = R · Δlon · cos(lat₀)
 *   N = R · Δlat
 *   U = alt − alt₀
 *
 * Adequate at flight scale (≤ tens of km). This is not WGS-84 geodesy.
 * NaN coordinates propagate into NaN components.
 *
 * @module enuProjection
 */

import * as THREE from "three";
import type { EnuTriple, GeoPoint } from "../../alignment/types";

/** Mean Earth radius (m) */
export const EARTH_RADIUS_M = 6_371_000;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Project geodetic samples into East-North-Up metres around `origin`.
 */
export function projectToEnu(
  origin: GeoPoint,
  samples: readonly GeoPoint[],
): EnuTriple[] {
  const lat0 = origin.latitude * DEG_TO_RAD;
  const lon0 = origin.longitude * DEG_TO_RAD;
  const cosLat0 = Math.cos(lat0);

  return samples.map((p) => {
    const dLat = p.latitude * DEG_TO_RAD - lat0;
    const dLon = p.longitude * DEG_TO_RAD - lon0;
    return new THREE.Vector3(
      EARTH_RADIUS_M * dLon * cosLat0,
      EARTH_RADIUS_M * dLat,
      p.altitude - origin.altitude,
    );
  });
}

/**
 * Inverse of {@link projectToEnu}; used to build synthetic GNSS tracks.
 */
export function enuToGeodetic(origin: GeoPoint, enu: EnuTriple): GeoPoint {
  const lat0 = origin.latitude * DEG_TO_RAD;
  return {
    latitude: origin.latitude + enu.y / EARTH_RADIUS_M / DEG_TO_RAD,
    longitude:
      origin.longitude + enu.x / (EARTH_RADIUS_M * Math.cos(lat0)) / DEG_TO_RAD,
    altitude: origin.altitude + enu.z,
  };
}

/**
 * First sample whose three coordinates are finite, or null.
 */
export function firstValidGeoPoint(
  samples: readonly GeoPoint[],
): GeoPoint | null {
  for (const p of samples) {
    if (
      Number.isFinite(p.latitude) &&
      Number.isFinite(p.longitude) &&
      Number.isFinite(p.altitude)
    ) {
      return { latitude: p.latitude, longitude: p.longitude, altitude: p.altitude };
    }
  }
  return null;
}
