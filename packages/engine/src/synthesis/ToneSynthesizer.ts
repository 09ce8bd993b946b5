/**
 * Tone Synthesizer
 *
 * Builds session waveforms for catalog entries: the catalog frequency
 * plus its 2nd and 3rd harmonics, summed and peak-normalized.
 *
 * ```
 * 0.4·sin(2πft) + 0.2·sin(2π·2f·t) + 0.1·sin(2π·3f·t)   → scale peak to 0.9
 * ```
 */

import * as Tonal from "tonal";
import { z } from "zod";
import type {
  Minutes,
  SampleRate,
  SessionReport,
  TonePartial,
  TreatmentId,
  TreatmentRecord,
  Waveform,
} from "@lattice/contracts";
import { NotFoundError } from "@lattice/contracts";
import { DEFAULT_SAMPLE_RATE } from "../constants/DerivedConstants";
import { parseOrThrow } from "../validation/parse";
import { mixPartials, normalizePeakInPlace, synthesizeTone } from "./tone";
import { TREATMENTS } from "./treatments";

/**
 * Configuration for the ToneSynthesizer.
 */
export interface ToneSynthesizerConfig {
  /** Output sample rate in Hz. @default 44100 */
  sampleRate?: SampleRate;

  /** Catalog to resolve session ids against. @default TREATMENTS */
  treatments?: readonly TreatmentRecord[];
}

const DEFAULT_CONFIG: Required<ToneSynthesizerConfig> = {
  sampleRate: DEFAULT_SAMPLE_RATE,
  treatments: TREATMENTS,
};

/** (harmonic multiple, amplitude) pairs of a session mix */
const SESSION_HARMONICS: ReadonlyArray<readonly [number, number]> = [
  [1, 0.4],
  [2, 0.2],
  [3, 0.1],
];

/** Peak level of a normalized session */
const SESSION_PEAK = 0.9;

const minutesSchema = z.number().finite().positive();

const TonePositiveSchema = z.object({
  frequencyHz: z.number().finite().positive(),
  durationS: z.number().finite().positive(),
});

export interface Session {
  waveform: Waveform;
  report: SessionReport;
}

/**
 * Nearest equal-tempered note to a frequency, spelled with sharps.
 */
export function nearestNote(frequencyHz: number): string {
  const midi = Tonal.Midi.freqToMidi(frequencyHz);
  return Tonal.Midi.midiToNoteName(midi, { sharps: true });
}

export class ToneSynthesizer {
  readonly sampleRate: SampleRate;

  private catalog: Map<TreatmentId, TreatmentRecord>;

  constructor(config: ToneSynthesizerConfig = {}) {
    this.sampleRate = config.sampleRate ?? DEFAULT_CONFIG.sampleRate;
    const treatments = config.treatments ?? DEFAULT_CONFIG.treatments;
    this.catalog = new Map(treatments.map((t) => [t.id, t]));
  }

  /**
   * A single sine tone. Frequency and duration must be strictly positive.
   */
  tone(frequencyHz: number, durationS: number, amplitude = 0.5): Waveform {
    parseOrThrow(
      TonePositiveSchema,
      { frequencyHz, durationS },
      "tone"
    );
    return synthesizeTone({
      frequencyHz,
      durationS,
      amplitude,
      sampleRate: this.sampleRate,
    });
  }

  listTreatments(): TreatmentRecord[] {
    return [...this.catalog.values()];
  }

  getTreatment(id: TreatmentId): TreatmentRecord {
    const treatment = this.catalog.get(id);
    if (!treatment) {
      throw new NotFoundError("treatment", id, [...this.catalog.keys()]);
    }
    return treatment;
  }

  /**
   * Generates a session for a catalog entry.
   *
   * @param minutes - Session length. @default 30
   */
  session(id: TreatmentId, minutes: Minutes = 30): Session {
    const treatment = this.getTreatment(id);
    const sessionMinutes = parseOrThrow(minutesSchema, minutes, "minutes");

    const partials: TonePartial[] = SESSION_HARMONICS.map(
      ([multiple, amplitude]) => ({
        frequencyHz: treatment.frequencyHz * multiple,
        amplitude,
      })
    );
    // The mix buffer is ours until returned; normalize it without a copy.
    const waveform = normalizePeakInPlace(
      mixPartials(partials, sessionMinutes * 60, this.sampleRate),
      SESSION_PEAK
    );

    return {
      waveform,
      report: {
        treatmentId: treatment.id,
        name: treatment.name,
        meaning: treatment.meaning,
        application: treatment.application,
        frequencyHz: treatment.frequencyHz,
        letterSum: treatment.letterSum,
        treatmentDays: treatment.durationDays,
        successRate: treatment.successRate,
        sessionMinutes,
        sampleCount: waveform.length,
        sampleRate: this.sampleRate,
        nearestNote: nearestNote(treatment.frequencyHz),
      },
    };
  }
}
