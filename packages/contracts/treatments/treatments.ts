import type { Days, Hz, Minutes, SampleRate, UnitInterval } from "../core/units";

export type TreatmentId = string;

/**
 * Static metadata for one named tone.
 *
 * `durationDays`, `successRate` and `letterSum` are carried as opaque
 * catalog figures. Nothing in the system computes or checks them.
 */
export interface TreatmentRecord {
  readonly id: TreatmentId;
  /** Name in its source script, e.g. "البصير" */
  readonly name: string;
  /** Transliteration and gloss, e.g. "Al-Baseer (The All-Seeing)" */
  readonly meaning: string;
  readonly application: string;
  readonly frequencyHz: Hz;
  readonly durationDays: Days;
  readonly successRate: UnitInterval;
  readonly letterSum: number;
}

export interface SessionReport {
  treatmentId: TreatmentId;
  name: string;
  meaning: string;
  application: string;
  frequencyHz: Hz;
  letterSum: number;
  treatmentDays: Days;
  successRate: UnitInterval;
  sessionMinutes: Minutes;
  sampleCount: number;
  sampleRate: SampleRate;
  /** Nearest equal-tempered note, sharps spelling (e.g. "C#5") */
  nearestNote: string;
}
