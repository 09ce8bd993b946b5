/**
 * Sine tone primitives.
 *
 * Every function except normalizePeakInPlace returns a freshly allocated
 * waveform and leaves its inputs untouched.
 */

import { z } from "zod";
import type { TonePartial, ToneSpec, Waveform } from "@lattice/contracts";
import { DomainError, peakAbs } from "@lattice/contracts";
import { parseOrThrow } from "../validation/parse";

const TWO_PI = 2 * Math.PI;

const frequencySchema = z.number().finite().nonnegative();
const durationSchema = z.number().finite().nonnegative();
const amplitudeSchema = z.number().min(0).max(1);
const sampleRateSchema = z.number().finite().positive();

const ToneSpecSchema = z.object({
  frequencyHz: frequencySchema,
  durationS: durationSchema,
  amplitude: amplitudeSchema,
  sampleRate: sampleRateSchema,
});

const PartialsSchema = z.array(
  z.object({ frequencyHz: frequencySchema, amplitude: amplitudeSchema })
);

function sampleCount(durationS: number, sampleRate: number): number {
  return Math.round(sampleRate * durationS);
}

function accumulate(
  out: Waveform,
  frequencyHz: number,
  amplitude: number,
  durationS: number
): void {
  const n = out.length;
  const step = durationS / n;
  const omega = TWO_PI * frequencyHz;
  for (let i = 0; i < n; i++) {
    out[i] += amplitude * Math.sin(omega * i * step);
  }
}

/**
 * `amplitude × sin(2πft)` at N = round(sampleRate × duration) evenly
 * spaced times over [0, duration).
 */
export function synthesizeTone(spec: ToneSpec): Waveform {
  const { frequencyHz, durationS, amplitude, sampleRate } = parseOrThrow(
    ToneSpecSchema,
    spec,
    "tone"
  );
  const out = new Float64Array(sampleCount(durationS, sampleRate));
  accumulate(out, frequencyHz, amplitude, durationS);
  return out;
}

/**
 * Sample-wise sum of several sine partials sharing one time grid.
 */
export function mixPartials(
  partials: readonly TonePartial[],
  durationS: number,
  sampleRate: number
): Waveform {
  const valid = parseOrThrow(PartialsSchema, partials, "partials");
  const duration = parseOrThrow(durationSchema, durationS, "durationS");
  const rate = parseOrThrow(sampleRateSchema, sampleRate, "sampleRate");

  const out = new Float64Array(sampleCount(duration, rate));
  for (const partial of valid) {
    accumulate(out, partial.frequencyHz, partial.amplitude, duration);
  }
  return out;
}

function scaleToPeak(source: Waveform, out: Waveform, target: number): Waveform {
  const peak = peakAbs(source);
  if (peak === 0) {
    throw new DomainError("Cannot normalize a silent waveform");
  }
  for (let i = 0; i < source.length; i++) {
    out[i] = (source[i] / peak) * target;
  }
  return out;
}

/**
 * Scales a waveform so its largest absolute sample equals `target`.
 * Silence has no peak to scale by and is rejected.
 */
export function normalizePeak(waveform: Waveform, target: number): Waveform {
  return scaleToPeak(waveform, new Float64Array(waveform.length), target);
}

/**
 * Same as normalizePeak, but overwrites and returns `waveform`. Only for
 * buffers the caller allocated and has not handed out.
 */
export function normalizePeakInPlace(waveform: Waveform, target: number): Waveform {
  return scaleToPeak(waveform, waveform, target);
}
