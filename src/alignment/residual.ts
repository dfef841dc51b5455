/**
 * Residual spatial offset after time alignment.
 *
 * The target is moved onto the reference clock (a reference time t reads
 * the target at t + offset), interpolated at the reference timestamps and
 * the per-axis differences are averaged. The length of the mean
 * difference vector is returned. Diagnostic only.
 */

import * as THREE from "three";
import { interpolateAt } from "../lib/signal/resample";
import type { EnuTriple } from "./types";

export function residualSpatialOffset(
  tA: ArrayLike<number>,
  enuA: readonly EnuTriple[],
  tB: ArrayLike<number>,
  enuB: readonly EnuTriple[],
  timeOffsetSeconds: number,
): number | null {
  const bE = enuB.map((v) => v.x);
  const bN = enuB.map((v) => v.y);
  const bU = enuB.map((v) => v.z);

  const sum = new THREE.Vector3();
  const diff = new THREE.Vector3();
  let count = 0;

  for (let i = 0; i < tA.length; i++) {
    const query = tA[i] + timeOffsetSeconds;
    diff.set(
      interpolateAt(tB, bE, query),
      interpolateAt(tB, bN, query),
      interpolateAt(tB, bU, query),
    );
    diff.sub(enuA[i]);

    if (
      Number.isFinite(diff.x) &&
      Number.isFinite(diff.y) &&
      Number.isFinite(diff.z)
    ) {
      sum.add(diff);
      count++;
    }
  }

  if (count === 0) return null;
  return sum.divideScalar(count).length();
}
