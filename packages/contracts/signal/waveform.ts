import type { Hz, SampleRate, Seconds, UnitInterval } from "../core/units";

/**
 * Mono sample sequence. Double precision so peak normalization is exact
 * to well below 1e-9.
 */
export type Waveform = Float64Array;

export interface ToneSpec {
  frequencyHz: Hz;
  durationS: Seconds;
  amplitude: UnitInterval;
  sampleRate: SampleRate;
}

/**
 * One sinusoid in an additive mix.
 */
export interface TonePartial {
  frequencyHz: Hz;
  amplitude: UnitInterval;
}

/**
 * Largest absolute sample value; 0 for an empty waveform.
 */
export function peakAbs(waveform: ArrayLike<number>): number {
  let peak = 0;
  for (let i = 0; i < waveform.length; i++) {
    const v = Math.abs(waveform[i]);
    if (v > peak) peak = v;
  }
  return peak;
}
