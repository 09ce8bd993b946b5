/**
 * 16-bit PCM WAV encoder
 *
 * Serializes a mono waveform to a RIFF/WAVE container. Samples are
 * clamped to [-1, 1], scaled by 32767 and truncated toward zero.
 */

import type { SampleRate, Waveform } from "@lattice/contracts";
import { ValidationError } from "@lattice/contracts";

const MAGIC_RIFF = 0x46464952;
const MAGIC_WAVE = 0x45564157;
const MAGIC_FMT = 0x20746d66;
const MAGIC_DATA = 0x61746164;

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;
const FORMAT_PCM = 1;
const CHANNELS = 1;

export function encodePcm16Wav(
  waveform: Waveform | readonly number[],
  sampleRate: SampleRate
): Uint8Array {
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new ValidationError([
      {
        field: "sampleRate",
        reason: `expected a positive integer, got ${sampleRate}`,
      },
    ]);
  }

  const frames = waveform.length;
  const dataBytes = frames * CHANNELS * BYTES_PER_SAMPLE;
  const buffer = new ArrayBuffer(HEADER_BYTES + dataBytes);
  const view = new DataView(buffer);

  view.setUint32(0, MAGIC_RIFF, true);
  view.setUint32(4, HEADER_BYTES - 8 + dataBytes, true);
  view.setUint32(8, MAGIC_WAVE, true);
  view.setUint32(12, MAGIC_FMT, true);
  view.setUint32(16, 16, true); // fmt chunk length
  view.setUint16(20, FORMAT_PCM, true);
  view.setUint16(22, CHANNELS, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * CHANNELS * BYTES_PER_SAMPLE, true);
  view.setUint16(32, CHANNELS * BYTES_PER_SAMPLE, true);
  view.setUint16(34, 8 * BYTES_PER_SAMPLE, true);
  view.setUint32(36, MAGIC_DATA, true);
  view.setUint32(40, dataBytes, true);

  let w = HEADER_BYTES;
  for (let i = 0; i < frames; i++) {
    const clamped = Math.max(-1, Math.min(1, waveform[i]));
    view.setInt16(w, Math.trunc(clamped * 32767), true);
    w += BYTES_PER_SAMPLE;
  }
  return new Uint8Array(buffer);
}
