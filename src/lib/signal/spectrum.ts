/**
 * Spectral diagnostics
 *
 * Time-domain correlation of a strongly periodic signal has a lobe every
 * half period, alternating in sign. A peak found far from zero lag, relative
 * to the dominant period, may be one of those lobes; the engine flags it.
 */

import FFT from "fft.js";

// ============================================
// Types
// ============================================

export interface PeriodicityCheck {
  dominantFrequencyHz: number;
  /** Infinity when no non-DC component carries power */
  dominantPeriodS: number;
  /** Peak lag beyond a quarter of the dominant period */
  ambiguous: boolean;
}

// ============================================
// FFT and Spectral Analysis
// ============================================

/**
 * Strongest non-DC frequency of a signal, 0 when the spectrum is flat
 * @param signal - Time series data
 * @param sampleRate - Sampling rate in Hz
 */
export function dominantFrequency(
  signal: ArrayLike<number>,
  sampleRate: number,
): number {
  // Pad to next power of 2 (fft.js needs at least 2)
  const n = Math.max(2, Math.pow(2, Math.ceil(Math.log2(Math.max(1, signal.length)))));
  const paddedSignal = new Array<number>(n).fill(0);
  for (let i = 0; i < signal.length; i++) paddedSignal[i] = signal[i];

  const fft = new FFT(n);
  const out = fft.createComplexArray();
  fft.realTransform(out, paddedSignal);

  // Positive frequencies, DC excluded
  let maxPower = 0;
  let dominantIdx = 0;
  for (let i = 1; i < n / 2; i++) {
    const real = out[2 * i];
    const imag = out[2 * i + 1];
    const power = real * real + imag * imag;
    if (power > maxPower) {
      maxPower = power;
      dominantIdx = i;
    }
  }

  return (dominantIdx * sampleRate) / n;
}

/**
 * Whether a correlation peak at `peakLagSeconds` could be a neighbouring
 * lobe of a periodic signal. Past a quarter period, the opposite-sign lobe
 * sits closer to zero lag than the chosen peak.
 */
export function periodicAmbiguity(
  signal: ArrayLike<number>,
  rateHz: number,
  peakLagSeconds: number,
): PeriodicityCheck {
  let mean = 0;
  for (let i = 0; i < signal.length; i++) mean += signal[i];
  mean /= Math.max(1, signal.length);

  const centered = Float64Array.from(signal, (v) => v - mean);
  const dominantFrequencyHz = dominantFrequency(centered, rateHz);
  const dominantPeriodS =
    dominantFrequencyHz > 0 ? 1 / dominantFrequencyHz : Infinity;

  return {
    dominantFrequencyHz,
    dominantPeriodS,
    ambiguous: Math.abs(peakLagSeconds) > dominantPeriodS / 4,
  };
}
