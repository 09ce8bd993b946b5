import { describe, it, expect } from "vitest";
import { DomainError, ValidationError, peakAbs } from "@lattice/contracts";
import {
  mixPartials,
  normalizePeak,
  normalizePeakInPlace,
  synthesizeTone,
} from "../../src/synthesis/tone";

describe("synthesizeTone", () => {
  it("produces round(sampleRate × duration) samples", () => {
    const wave = synthesizeTone({
      frequencyHz: 440,
      durationS: 0.0123,
      amplitude: 0.5,
      sampleRate: 8000,
    });
    // 8000 × 0.0123 = 98.4
    expect(wave.length).toBe(98);
  });

  it("never exceeds the requested amplitude", () => {
    const wave = synthesizeTone({
      frequencyHz: 1000,
      durationS: 0.1,
      amplitude: 0.3,
      sampleRate: 44100,
    });
    expect(peakAbs(wave)).toBeLessThanOrEqual(0.3);
    expect(peakAbs(wave)).toBeGreaterThan(0.29);
  });

  it("starts at zero phase", () => {
    const wave = synthesizeTone({
      frequencyHz: 100,
      durationS: 0.01,
      amplitude: 1,
      sampleRate: 4000,
    });
    expect(wave[0]).toBe(0);
  });

  it("hits the quarter-period peak on an aligned grid", () => {
    // 1 Hz at 4 samples over 1 s: t = 0, 0.25, 0.5, 0.75
    const wave = synthesizeTone({
      frequencyHz: 1,
      durationS: 1,
      amplitude: 0.5,
      sampleRate: 4,
    });
    expect(wave.length).toBe(4);
    expect(wave[1]).toBeCloseTo(0.5, 12);
    expect(wave[2]).toBeCloseTo(0, 12);
    expect(wave[3]).toBeCloseTo(-0.5, 12);
  });

  it("returns an empty waveform for zero duration", () => {
    const wave = synthesizeTone({
      frequencyHz: 440,
      durationS: 0,
      amplitude: 0.5,
      sampleRate: 44100,
    });
    expect(wave.length).toBe(0);
  });

  it.each([
    ["negative frequency", { frequencyHz: -1, durationS: 1, amplitude: 0.5, sampleRate: 100 }],
    ["negative duration", { frequencyHz: 1, durationS: -1, amplitude: 0.5, sampleRate: 100 }],
    ["amplitude above 1", { frequencyHz: 1, durationS: 1, amplitude: 1.5, sampleRate: 100 }],
    ["zero sample rate", { frequencyHz: 1, durationS: 1, amplitude: 0.5, sampleRate: 0 }],
  ])("rejects %s", (_label, spec) => {
    expect(() => synthesizeTone(spec)).toThrow(ValidationError);
  });

  it("names the offending field", () => {
    let caught: unknown;
    try {
      synthesizeTone({ frequencyHz: 1, durationS: 1, amplitude: 2, sampleRate: 100 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.issues.map((i) => i.field)).toEqual(["amplitude"]);
    }
  });
});

describe("mixPartials", () => {
  it("sums partials sample-wise", () => {
    const a = synthesizeTone({ frequencyHz: 50, durationS: 0.05, amplitude: 0.4, sampleRate: 2000 });
    const b = synthesizeTone({ frequencyHz: 100, durationS: 0.05, amplitude: 0.2, sampleRate: 2000 });
    const mix = mixPartials(
      [
        { frequencyHz: 50, amplitude: 0.4 },
        { frequencyHz: 100, amplitude: 0.2 },
      ],
      0.05,
      2000
    );

    expect(mix.length).toBe(100);
    for (let i = 0; i < mix.length; i++) {
      expect(mix[i]).toBeCloseTo(a[i] + b[i], 12);
    }
  });

  it("is silent with no partials", () => {
    const mix = mixPartials([], 0.01, 1000);
    expect(mix.length).toBe(10);
    expect(peakAbs(mix)).toBe(0);
  });
});

describe("normalizePeak", () => {
  it("scales the largest absolute sample to the target", () => {
    const input = new Float64Array([0.1, -0.4, 0.2]);
    const out = normalizePeak(input, 0.9);

    expect(Array.from(out)).toEqual([
      (0.1 / 0.4) * 0.9,
      -0.9,
      (0.2 / 0.4) * 0.9,
    ]);
  });

  it("does not modify its input", () => {
    const input = new Float64Array([0.5, -0.25]);
    normalizePeak(input, 1);
    expect(Array.from(input)).toEqual([0.5, -0.25]);
  });

  it("rejects silence", () => {
    expect(() => normalizePeak(new Float64Array(8), 0.9)).toThrow(DomainError);
  });

  it("rejects an empty waveform", () => {
    expect(() => normalizePeak(new Float64Array(0), 0.9)).toThrow(DomainError);
  });
});

describe("normalizePeakInPlace", () => {
  it("scales and returns the same buffer", () => {
    const input = new Float64Array([0.1, -0.4, 0.2]);
    const out = normalizePeakInPlace(input, 0.9);

    expect(out).toBe(input);
    expect(Array.from(input)).toEqual([
      (0.1 / 0.4) * 0.9,
      -0.9,
      (0.2 / 0.4) * 0.9,
    ]);
  });

  it("rejects silence and leaves the buffer as it was", () => {
    const input = new Float64Array(4);
    expect(() => normalizePeakInPlace(input, 0.9)).toThrow(DomainError);
    expect(Array.from(input)).toEqual([0, 0, 0, 0]);
  });
});
