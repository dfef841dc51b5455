/**
 * Resampling onto a common uniform grid
 * =====================================
 *
 * Two irregularly sampled series are linearly interpolated onto one grid
 * spanning the intersection of their time spans. No extrapolation: a query
 * outside a series' span is NaN; a query that falls exactly on a sample
 * takes that sample's value.
 *
 * @module resample
 */

export type Channel = ArrayLike<number>;

export interface ResampledPair {
  status: "OK";
  /** Common grid, seconds */
  time: Float64Array;
  /** Channels of series A on the grid */
  a: Float64Array[];
  /** Channels of series B on the grid */
  b: Float64Array[];
}

export interface InsufficientOverlap {
  status: "INSUFFICIENT_OVERLAP";
  /** Grid points the intersection would have held (0 when disjoint) */
  overlapSamples: number;
}

export type ResampleResult = ResampledPair | InsufficientOverlap;

// Absorbs (end − start)·rate landing a hair under an integer
const GRID_EPSILON = 1e-9;

/**
 * Linear interpolation of (t, x) at a single time.
 * `t` must be strictly increasing.
 */
export function interpolateAt(
  t: ArrayLike<number>,
  x: ArrayLike<number>,
  query: number,
): number {
  const n = t.length;
  if (n === 0 || !(query >= t[0]) || !(query <= t[n - 1])) {
    return NaN;
  }

  // First index with t[hi] >= query
  let lo = 0;
  let hi = n - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (t[mid] < query) lo = mid + 1;
    else hi = mid;
  }

  if (t[hi] === query) return x[hi];

  const t0 = t[hi - 1];
  const t1 = t[hi];
  const w = (query - t0) / (t1 - t0);
  return x[hi - 1] + w * (x[hi] - x[hi - 1]);
}

/**
 * Interpolate (t, x) at every query time.
 */
export function interpolateSeries(
  t: ArrayLike<number>,
  x: ArrayLike<number>,
  queries: ArrayLike<number>,
): Float64Array {
  const out = new Float64Array(queries.length);
  for (let i = 0; i < queries.length; i++) {
    out[i] = interpolateAt(t, x, queries[i]);
  }
  return out;
}

/**
 * Drop samples where any channel is NaN/±Infinity.
 */
export function dropNonFinite(
  t: ArrayLike<number>,
  channels: readonly Channel[],
): { t: Float64Array; channels: Float64Array[] } {
  const keep: number[] = [];
  for (let i = 0; i < t.length; i++) {
    if (channels.every((c) => Number.isFinite(c[i]))) keep.push(i);
  }

  return {
    t: Float64Array.from(keep, (i) => t[i]),
    channels: channels.map((c) => Float64Array.from(keep, (i) => c[i])),
  };
}

/**
 * Number of grid points in [start, end] at `rateHz` (0 if end < start).
 */
export function gridSize(start: number, end: number, rateHz: number): number {
  if (!(end >= start)) return 0;
  return Math.floor((end - start) * rateHz + GRID_EPSILON) + 1;
}

/**
 * Uniform grid start + k/rateHz, clamped so the last point never passes `end`.
 */
export function uniformGrid(
  start: number,
  end: number,
  rateHz: number,
): Float64Array {
  const n = gridSize(start, end, rateHz);
  const grid = new Float64Array(n);
  for (let k = 0; k < n; k++) {
    grid[k] = Math.min(start + k / rateHz, end);
  }
  return grid;
}

/**
 * Resample series A and B (each with one or more channels sharing its
 * timestamps) onto the grid covering the intersection of their spans.
 */
export function resample(
  tA: ArrayLike<number>,
  xA: readonly Channel[],
  tB: ArrayLike<number>,
  xB: readonly Channel[],
  rateHz: number,
  minOverlapSamples: number,
): ResampleResult {
  const a = dropNonFinite(tA, xA);
  const b = dropNonFinite(tB, xB);

  if (a.t.length === 0 || b.t.length === 0) {
    return { status: "INSUFFICIENT_OVERLAP", overlapSamples: 0 };
  }

  const start = Math.max(a.t[0], b.t[0]);
  const end = Math.min(a.t[a.t.length - 1], b.t[b.t.length - 1]);
  const n = gridSize(start, end, rateHz);

  if (n < minOverlapSamples) {
    return { status: "INSUFFICIENT_OVERLAP", overlapSamples: n };
  }

  const time = uniformGrid(start, end, rateHz);
  return {
    status: "OK",
    time,
    a: a.channels.map((c) => interpolateSeries(a.t, c, time)),
    b: b.channels.map((c) => interpolateSeries(b.t, c, time)),
  };
}
