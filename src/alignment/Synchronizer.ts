/**
 * Synchronizer
 * ============
 *
 * Merges several tabular sources (timestamp + numeric columns) onto one
 * uniform time base, once their clock offsets are known. Columns are
 * linearly interpolated and NaN outside a source's span.
 *
 * A source's `timeOffset` is an alignment offset: the source lags the
 * reference clock by that many seconds, so it is subtracted from the
 * source timestamps.
 *
 * @module Synchronizer
 */

import { syncLog } from "../lib/logger";
import { interpolateSeries } from "../lib/signal/resample";
import { InvalidInputError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface TabularSource {
  timestamps: ArrayLike<number>;
  columns: Record<string, ArrayLike<number>>;
}

export interface AddSourceOptions {
  /** Column prefix in the merged table (default `${name}_`) */
  prefix?: string;
  /** Seconds the source lags the reference clock (default 0) */
  timeOffset?: number;
}

export interface SourceInfo {
  samples: number;
  durationS: number;
  sampleRateHz: number;
  tStart: number;
  tEnd: number;
  columns: string[];
}

export interface SynchronizeOptions {
  /** Grid rate; defaults to the fastest source, may not exceed it */
  targetRateHz?: number;
  /** Sources to include (default: all) */
  sources?: string[];
  /** Columns per source (default: all) */
  sourceColumns?: Record<string, string[]>;
}

export interface SynchronizedTable {
  timestamp: Float64Array;
  columns: Record<string, Float64Array>;
  rateHz: number;
}

interface RegisteredSource {
  timestamps: Float64Array;
  columns: Record<string, ArrayLike<number>>;
  prefix: string;
}

// ============================================================================
// SYNCHRONIZER
// ============================================================================

export class Synchronizer {
  private readonly sources = new Map<string, RegisteredSource>();

  addSource(
    name: string,
    data: TabularSource,
    options: AddSourceOptions = {},
  ): void {
    const n = data.timestamps.length;
    if (n === 0) {
      throw new InvalidInputError(name, "data source is empty");
    }
    for (const [col, values] of Object.entries(data.columns)) {
      if (values.length !== n) {
        throw new InvalidInputError(
          name,
          `column "${col}" has ${values.length} values for ${n} timestamps`,
        );
      }
    }

    const timeOffset = options.timeOffset ?? 0;
    if (!Number.isFinite(timeOffset)) {
      throw new InvalidInputError(name, "timeOffset must be finite");
    }

    const timestamps = Float64Array.from(data.timestamps, (t) => t - timeOffset);
    for (let i = 1; i < n; i++) {
      if (!(timestamps[i] > timestamps[i - 1])) {
        throw new InvalidInputError(
          name,
          `timestamps must be strictly increasing (index ${i})`,
        );
      }
    }

    if (this.sources.has(name)) {
      syncLog.warn(`Overwriting existing data source: ${name}`);
    }

    const prefix = options.prefix ?? `${name}_`;
    this.sources.set(name, { timestamps, columns: data.columns, prefix });
    syncLog.info(
      `Added data source '${name}' with ${n} samples, prefix='${prefix}', offset=${timeOffset}s`,
    );
  }

  removeSource(name: string): void {
    if (this.sources.delete(name)) {
      syncLog.info(`Removed data source: ${name}`);
    }
  }

  /**
   * Time span and rate per source. Sources with fewer than two samples
   * are left out.
   */
  getSourceInfo(): Record<string, SourceInfo> {
    const info: Record<string, SourceInfo> = {};

    for (const [name, source] of this.sources) {
      const n = source.timestamps.length;
      if (n < 2) {
        syncLog.warn(`Source '${name}' has insufficient data for time analysis`);
        continue;
      }
      const tStart = source.timestamps[0];
      const tEnd = source.timestamps[n - 1];
      const durationS = tEnd - tStart;

      info[name] = {
        samples: n,
        durationS,
        sampleRateHz: durationS > 0 ? n / durationS : 0,
        tStart,
        tEnd,
        columns: Object.keys(source.columns),
      };
    }

    return info;
  }

  getMaxSampleRate(): number {
    const rates = Object.values(this.getSourceInfo()).map((s) => s.sampleRateHz);
    return rates.length > 0 ? Math.max(...rates) : 0;
  }

  /**
   * Range covered by every source, [0, 0] when there is none.
   */
  getCommonTimeRange(): [number, number] {
    const spans = Object.values(this.getSourceInfo());
    if (spans.length === 0) return [0, 0];
    return [
      Math.max(...spans.map((s) => s.tStart)),
      Math.min(...spans.map((s) => s.tEnd)),
    ];
  }

  synchronize(options: SynchronizeOptions = {}): SynchronizedTable {
    if (this.sources.size === 0) {
      throw new InvalidInputError("sources", "no data sources added");
    }

    const info = this.getSourceInfo();
    const names = options.sources ?? Object.keys(info);
    for (const name of names) {
      if (!this.sources.has(name)) {
        throw new InvalidInputError("sources", `unknown source: ${name}`);
      }
    }
    if (names.length === 0) {
      throw new InvalidInputError("sources", "no valid sources to synchronize");
    }

    const maxRate = this.getMaxSampleRate();
    const rateHz = options.targetRateHz ?? maxRate;
    if (!(rateHz > 0) || rateHz > maxRate) {
      throw new InvalidInputError(
        "targetRateHz",
        `${rateHz} Hz outside (0, ${maxRate.toFixed(2)}] Hz`,
      );
    }

    const [tStart, tEnd] = this.getCommonTimeRange();
    if (!(tEnd > tStart)) {
      throw new Error("No overlapping time range between sources");
    }

    // linspace(tStart, tEnd, n)
    const n = Math.floor((tEnd - tStart) * rateHz) + 1;
    const timestamp = new Float64Array(n);
    const step = n > 1 ? (tEnd - tStart) / (n - 1) : 0;
    for (let k = 0; k < n; k++) {
      timestamp[k] = k === n - 1 ? tEnd : tStart + k * step;
    }

    const columns: Record<string, Float64Array> = {};
    for (const name of names) {
      const source = this.sources.get(name);
      if (!source) continue;

      const requested = options.sourceColumns?.[name] ?? Object.keys(source.columns);
      const present = requested.filter((c) => c in source.columns);
      if (present.length === 0) {
        syncLog.warn(`No columns to synchronize for source '${name}'`);
        continue;
      }

      for (const col of present) {
        columns[`${source.prefix}${col}`] = interpolateSeries(
          source.timestamps,
          source.columns[col],
          timestamp,
        );
      }
    }

    syncLog.info(
      `Synchronized ${names.length} source(s) to ${rateHz.toFixed(2)} Hz (${n} samples, ${(tEnd - tStart).toFixed(2)}s duration)`,
    );

    return { timestamp, columns, rateHz };
  }

  summary(): string {
    const info = this.getSourceInfo();
    const entries = Object.entries(info);
    if (entries.length === 0) return "No data sources added.";

    const rule = "=".repeat(60);
    const lines = ["Synchronizer Data Sources Summary", rule];

    for (const [name, s] of entries) {
      lines.push(
        "",
        name.toUpperCase(),
        `  Samples: ${s.samples}`,
        `  Duration: ${s.durationS.toFixed(2)} s`,
        `  Sample Rate: ${s.sampleRateHz.toFixed(2)} Hz`,
        `  Time Range: ${s.tStart.toFixed(3)} - ${s.tEnd.toFixed(3)} s`,
        `  Columns: ${s.columns.join(", ")}`,
      );
    }

    const [tStart, tEnd] = this.getCommonTimeRange();
    lines.push(
      "",
      rule,
      `Common Time Range: ${tStart.toFixed(3)} - ${tEnd.toFixed(3)} s (${(tEnd - tStart).toFixed(2)} s)`,
      `Maximum Sample Rate: ${this.getMaxSampleRate().toFixed(2)} Hz`,
    );

    return lines.join("\n");
  }
}
