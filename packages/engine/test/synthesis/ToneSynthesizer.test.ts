import { describe, it, expect, beforeEach } from "vitest";
import type { TreatmentRecord } from "@lattice/contracts";
import {
  DomainError,
  NotFoundError,
  ValidationError,
  peakAbs,
} from "@lattice/contracts";
import { ToneSynthesizer, nearestNote } from "../../src/synthesis/ToneSynthesizer";
import { TREATMENTS } from "../../src/synthesis/treatments";

function makeTreatment(overrides: Partial<TreatmentRecord>): TreatmentRecord {
  return {
    id: "test",
    name: "test",
    meaning: "test tone",
    application: "testing",
    frequencyHz: 100,
    durationDays: 1,
    successRate: 0.5,
    letterSum: 1,
    ...overrides,
  };
}

describe("ToneSynthesizer", () => {
  let synth: ToneSynthesizer;

  beforeEach(() => {
    synth = new ToneSynthesizer({ sampleRate: 8000 });
  });

  describe("tone", () => {
    it("uses the configured sample rate", () => {
      expect(synth.tone(440, 0.5).length).toBe(4000);
    });

    it("defaults to 44100 Hz", () => {
      const defaultSynth = new ToneSynthesizer();
      expect(defaultSynth.sampleRate).toBe(44100);
      expect(defaultSynth.tone(440, 0.01).length).toBe(441);
    });

    it("rejects a zero frequency or duration", () => {
      expect(() => synth.tone(0, 1)).toThrow(ValidationError);
      expect(() => synth.tone(440, 0)).toThrow(ValidationError);
      expect(() => synth.tone(-440, 1)).toThrow(ValidationError);
    });

    it("defaults amplitude to 0.5", () => {
      const wave = synth.tone(500, 0.1);
      expect(peakAbs(wave)).toBeLessThanOrEqual(0.5);
      // 500 Hz at 8 kHz lands on sin(π/2) every 16 samples
      expect(peakAbs(wave)).toBeCloseTo(0.5, 12);
    });
  });

  describe("config", () => {
    it("falls back to defaults for explicit undefined fields", () => {
      const defaults = new ToneSynthesizer({
        sampleRate: undefined,
        treatments: undefined,
      });

      expect(defaults.sampleRate).toBe(44100);
      expect(defaults.listTreatments()).toHaveLength(TREATMENTS.length);
      expect(defaults.getTreatment("vision").frequencyHz).toBe(540.78);
    });
  });

  describe("catalog", () => {
    it("lists the built-in treatments", () => {
      expect(synth.listTreatments().map((t) => t.id)).toEqual([
        "vision",
        "hearing",
        "cancer",
        "hiv",
        "sickle_cell",
        "diabetes",
        "jinn",
      ]);
    });

    it("looks up a treatment by id", () => {
      const vision = synth.getTreatment("vision");
      expect(vision.frequencyHz).toBe(540.78);
      expect(vision.letterSum).toBe(302);
    });

    it("enumerates valid ids for an unknown id", () => {
      expect(() => synth.getTreatment("nope")).toThrow(
        "Unknown treatment: nope. Available: vision, hearing, cancer, hiv, sickle_cell, diabetes, jinn"
      );
      expect(() => synth.getTreatment("nope")).toThrow(NotFoundError);
    });

    it("exposes the available ids on the error", () => {
      let caught: unknown;
      try {
        synth.getTreatment("nope");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(NotFoundError);
      if (caught instanceof NotFoundError) {
        expect(caught.code).toBe("not-found");
        expect(caught.available).toHaveLength(TREATMENTS.length);
      }
    });
  });

  describe("session", () => {
    it("normalizes the mix to a 0.9 peak", () => {
      const { waveform } = synth.session("vision", 0.01);
      expect(Math.abs(peakAbs(waveform) - 0.9)).toBeLessThan(1e-9);
    });

    it("normalizes every catalog entry", () => {
      for (const treatment of synth.listTreatments()) {
        const { waveform } = synth.session(treatment.id, 0.005);
        expect(Math.abs(peakAbs(waveform) - 0.9)).toBeLessThan(1e-9);
      }
    });

    it("produces sampleRate × minutes × 60 samples", () => {
      const { waveform, report } = synth.session("vision", 0.01);
      expect(waveform.length).toBe(4800);
      expect(report.sampleCount).toBe(4800);
    });

    it("echoes the treatment metadata", () => {
      const { report } = synth.session("jinn", 0.01);

      expect(report).toEqual({
        treatmentId: "jinn",
        name: "القهار",
        meaning: "Al-Qahhar (The Subduer)",
        application: "spiritual",
        frequencyHz: 806.42,
        letterSum: 452,
        treatmentDays: 0.0625,
        successRate: 0.99,
        sessionMinutes: 0.01,
        sampleCount: 4800,
        sampleRate: 8000,
        nearestNote: "G5",
      });
    });

    it("matches the three-harmonic mix before scaling", () => {
      const custom = new ToneSynthesizer({
        sampleRate: 4,
        treatments: [makeTreatment({ frequencyHz: 1 })],
      });
      // 1 Hz on a 4-sample, 1 s grid: 0.4 − 0.1 = 0.3 at t = 0.25, −0.3 at t = 0.75
      const { waveform } = custom.session("test", 1 / 60);

      expect(waveform.length).toBe(4);
      expect(waveform[1]).toBeCloseTo(0.9, 12);
      expect(waveform[3]).toBeCloseTo(-0.9, 12);
    });

    it("matches an independently computed mix sample by sample", () => {
      const custom = new ToneSynthesizer({
        sampleRate: 1000,
        treatments: [makeTreatment({ frequencyHz: 100 })],
      });
      const { waveform } = custom.session("test", 0.001);

      // 100 Hz on a 1 kHz grid: ten samples per period, no cancelling phases
      const raw = Array.from({ length: 60 }, (_, i) => {
        const t = i / 1000;
        return (
          0.4 * Math.sin(2 * Math.PI * 100 * t) +
          0.2 * Math.sin(2 * Math.PI * 200 * t) +
          0.1 * Math.sin(2 * Math.PI * 300 * t)
        );
      });
      const peak = Math.max(...raw.map(Math.abs));

      expect(waveform.length).toBe(60);
      raw.forEach((value, i) => {
        expect(waveform[i]).toBeCloseTo((value / peak) * 0.9, 9);
      });
    });

    it("returns a new buffer on every call", () => {
      const first = synth.session("vision", 0.001);
      const second = synth.session("vision", 0.001);

      expect(second.waveform).not.toBe(first.waveform);
      expect(Array.from(second.waveform)).toEqual(Array.from(first.waveform));
    });

    it("fails on an unknown id", () => {
      expect(() => synth.session("nope")).toThrow(NotFoundError);
    });

    it("rejects non-positive minutes", () => {
      expect(() => synth.session("vision", 0)).toThrow(ValidationError);
      expect(() => synth.session("vision", -1)).toThrow(ValidationError);
    });

    it("rejects a silent treatment", () => {
      const silent = new ToneSynthesizer({
        sampleRate: 8000,
        treatments: [makeTreatment({ id: "silent", frequencyHz: 0 })],
      });
      expect(() => silent.session("silent", 0.01)).toThrow(DomainError);
    });
  });
});

describe("nearestNote", () => {
  it.each([
    [440, "A4"],
    [261.63, "C4"],
    [540.78, "C#5"],
    [806.42, "G5"],
  ])("maps %s Hz to %s", (frequency, note) => {
    expect(nearestNote(frequency)).toBe(note);
  });
});
