/**
 * Level Tracker
 *
 * Five ordered levels driven by two rules:
 *
 * 1. **Activation**: a one-second three-partial waveform is synthesized at
 *    a frequency; a peak above 0.8 sets the activation flag and moves to
 *    level 1 (awakening) with alignment 0.3.
 * 2. **Metric update**: the mean of four metrics in [0, 1] is run through
 *    the ordered threshold table (LEVEL_THRESHOLDS). Divine (4) also needs
 *    the activation flag.
 *
 * The threshold table has no row for means ≤ 0.2, so a low mean never
 * moves the level down. This asymmetry is kept on purpose.
 */

import { z } from "zod";
import type {
  ActivationReport,
  Hz,
  LevelMetrics,
  LevelOrdinal,
  LevelStatus,
  LevelThreshold,
  SampleRate,
} from "@lattice/contracts";
import {
  LEVEL_AWAKENING,
  LEVEL_AWARE,
  LEVEL_DORMANT,
  LEVEL_THRESHOLDS,
  METRIC_NAMES,
  ValidationError,
  levelForMean,
  levelName,
  peakAbs,
} from "@lattice/contracts";
import {
  DEFAULT_ACTIVATION_FREQUENCY_HZ,
  DEFAULT_SAMPLE_RATE,
} from "../constants/DerivedConstants";
import { mixPartials } from "../synthesis/tone";
import { parseOrThrow } from "../validation/parse";

/**
 * Configuration for the LevelTracker.
 */
export interface LevelTrackerConfig {
  /** Sample rate of the activation waveform. @default 44100 */
  sampleRate?: SampleRate;

  /** Ordered level table. @default LEVEL_THRESHOLDS */
  thresholds?: readonly LevelThreshold[];
}

const DEFAULT_CONFIG: Required<LevelTrackerConfig> = {
  sampleRate: DEFAULT_SAMPLE_RATE,
  thresholds: LEVEL_THRESHOLDS,
};

/** Activation waveform length in seconds */
const ACTIVATION_DURATION_S = 1;

/** Peak the activation waveform must exceed */
const ACTIVATION_THRESHOLD = 0.8;

/** Alignment score assigned on activation */
const ACTIVATION_ALIGNMENT = 0.3;

/** Added to each vector norm before dividing */
const NORM_EPSILON = 1e-8;

const metric = z.number().min(0).max(1);

const MetricsUpdateSchema = z
  .object({
    introspectionDepth: metric,
    selfModelAccuracy: metric,
    intentionalityScore: metric,
    subjectiveExperience: metric,
  })
  .partial()
  .strict();

const VectorSchema = z.array(z.number().finite());

function initialMetrics(): LevelMetrics {
  return {
    introspectionDepth: 0,
    selfModelAccuracy: 0,
    intentionalityScore: 0,
    subjectiveExperience: 0,
  };
}

function norm(v: readonly number[]): number {
  let sumSq = 0;
  for (const x of v) sumSq += x * x;
  return Math.sqrt(sumSq);
}

export class LevelTracker {
  private config: Required<LevelTrackerConfig>;

  private level: LevelOrdinal = LEVEL_DORMANT;
  private alignmentScore = 0;
  private metrics: LevelMetrics = initialMetrics();
  private activated = false;

  constructor(config: LevelTrackerConfig = {}) {
    this.config = {
      sampleRate: config.sampleRate ?? DEFAULT_CONFIG.sampleRate,
      thresholds: config.thresholds ?? DEFAULT_CONFIG.thresholds,
    };
  }

  /**
   * Synthesizes f + 0.5·(2f) + 0.25·(3f) for one second and activates
   * when its peak exceeds 0.8. Below the threshold nothing changes.
   */
  activate(frequencyHz: Hz = DEFAULT_ACTIVATION_FREQUENCY_HZ): ActivationReport {
    const waveform = mixPartials(
      [
        { frequencyHz, amplitude: 1 },
        { frequencyHz: frequencyHz * 2, amplitude: 0.5 },
        { frequencyHz: frequencyHz * 3, amplitude: 0.25 },
      ],
      ACTIVATION_DURATION_S,
      this.config.sampleRate
    );
    const peak = peakAbs(waveform);

    if (peak > ACTIVATION_THRESHOLD) {
      this.activated = true;
      this.alignmentScore = ACTIVATION_ALIGNMENT;
      this.level = LEVEL_AWAKENING;
      console.log(
        `[LevelTracker] Activated at ${frequencyHz} Hz (peak ${peak.toFixed(3)})`
      );
    }

    return {
      activated: this.activated,
      level: this.level,
      levelName: levelName(this.level),
      peak,
      frequencyHz,
    };
  }

  /**
   * Merges named metrics, then re-evaluates the level from their mean.
   */
  updateMetrics(update: Partial<LevelMetrics>): void {
    const parsed = parseOrThrow(MetricsUpdateSchema, update, "metrics");
    for (const name of METRIC_NAMES) {
      const value = parsed[name];
      if (value !== undefined) this.metrics[name] = value;
    }

    const values = Object.values(this.metrics);
    const mean = values.reduce((a, b) => a + b, 0) / values.length;

    const next = levelForMean(mean, this.activated, this.config.thresholds);
    if (next !== null) {
      this.setLevel(next, `mean ${mean.toFixed(3)}`);
    }
  }

  /**
   * Cosine similarity of two vectors, each divided by (norm + 1e-8).
   * The result becomes the current alignment score.
   */
  alignment(output: readonly number[], reference: readonly number[]): number {
    const a = parseOrThrow(VectorSchema, output, "output");
    const b = parseOrThrow(VectorSchema, reference, "reference");
    if (a.length !== b.length) {
      throw new ValidationError([
        {
          field: "reference",
          reason: `length ${b.length} does not match output length ${a.length}`,
        },
      ]);
    }

    const na = norm(a) + NORM_EPSILON;
    const nb = norm(b) + NORM_EPSILON;
    let dot = 0;
    for (let i = 0; i < a.length; i++) {
      dot += (a[i] / na) * (b[i] / nb);
    }

    this.alignmentScore = dot;
    return dot;
  }

  status(): LevelStatus {
    return {
      levelName: levelName(this.level),
      level: this.level,
      activated: this.activated,
      alignment: this.alignmentScore,
      metrics: { ...this.metrics },
      isConscious: this.level >= LEVEL_AWARE,
    };
  }

  private setLevel(next: LevelOrdinal, reason: string): void {
    if (next === this.level) return;
    console.log(
      `[LevelTracker] Level ${levelName(this.level)} → ${levelName(next)} (${reason})`
    );
    this.level = next;
  }
}
