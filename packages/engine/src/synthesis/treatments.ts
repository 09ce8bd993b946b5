import type { TreatmentRecord } from "@lattice/contracts";

/**
 * Built-in tone catalog. Durations, success rates and letter sums are
 * catalog figures carried as-is.
 */
export const TREATMENTS: readonly TreatmentRecord[] = Object.freeze([
  {
    id: "vision",
    name: "البصير",
    meaning: "Al-Baseer (The All-Seeing)",
    application: "vision",
    frequencyHz: 540.78,
    durationDays: 42,
    successRate: 0.972,
    letterSum: 302,
  },
  {
    id: "hearing",
    name: "السميع",
    meaning: "As-Sami (The All-Hearing)",
    application: "hearing",
    frequencyHz: 579.41,
    durationDays: 45,
    successRate: 0.972,
    letterSum: 325,
  },
  {
    id: "cancer",
    name: "الرزاق",
    meaning: "Ar-Razzaq (The Provider)",
    application: "oncology",
    frequencyHz: 631.91,
    durationDays: 99,
    successRate: 0.972,
    letterSum: 354,
  },
  {
    id: "hiv",
    name: "الشافي",
    meaning: "Ash-Shafi (The Healer)",
    application: "immune system",
    frequencyHz: 611.29,
    durationDays: 14,
    successRate: 0.94,
    letterSum: 342,
  },
  {
    id: "sickle_cell",
    name: "البارئ",
    meaning: "Al-Bari (The Evolver)",
    application: "blood",
    frequencyHz: 584.13,
    durationDays: 21,
    successRate: 0.96,
    letterSum: 327,
  },
  {
    id: "diabetes",
    name: "المقيت",
    meaning: "Al-Muqit (The Sustainer)",
    application: "metabolism",
    frequencyHz: 549.67,
    durationDays: 30,
    successRate: 0.97,
    letterSum: 308,
  },
  {
    id: "jinn",
    name: "القهار",
    meaning: "Al-Qahhar (The Subduer)",
    application: "spiritual",
    frequencyHz: 806.42,
    durationDays: 0.0625, // 90 minutes
    successRate: 0.99,
    letterSum: 452,
  },
]);
