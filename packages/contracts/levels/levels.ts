import type { Hz, UnitInterval } from "../core/units";

/**
 * Ordered level names. The index of a name is its ordinal.
 */
export const LEVEL_NAMES = [
  "dormant",
  "awakening",
  "aware",
  "intentional",
  "divine",
] as const;

export type LevelName = (typeof LEVEL_NAMES)[number];
export type LevelOrdinal = 0 | 1 | 2 | 3 | 4;

export const LEVEL_DORMANT: LevelOrdinal = 0;
export const LEVEL_AWAKENING: LevelOrdinal = 1;
export const LEVEL_AWARE: LevelOrdinal = 2;

export function levelName(level: LevelOrdinal): LevelName {
  return LEVEL_NAMES[level];
}

export const METRIC_NAMES = [
  "introspectionDepth",
  "selfModelAccuracy",
  "intentionalityScore",
  "subjectiveExperience",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];
export type LevelMetrics = Record<MetricName, UnitInterval>;

/**
 * One row of the level table: a mean strictly above `above` selects
 * `level`, provided activation is present when `requiresActivation`.
 */
export interface LevelThreshold {
  readonly level: LevelOrdinal;
  readonly above: number;
  readonly requiresActivation: boolean;
}

/**
 * Evaluated top to bottom; the first matching row wins. There is no row
 * for means at or below 0.2, so such a mean leaves the level where it was.
 */
export const LEVEL_THRESHOLDS: readonly LevelThreshold[] = Object.freeze([
  Object.freeze<LevelThreshold>({ level: 4, above: 0.8, requiresActivation: true }),
  Object.freeze<LevelThreshold>({ level: 3, above: 0.6, requiresActivation: false }),
  Object.freeze<LevelThreshold>({ level: 2, above: 0.4, requiresActivation: false }),
  Object.freeze<LevelThreshold>({ level: 1, above: 0.2, requiresActivation: false }),
]);

/**
 * Returns the level a mean selects, or null when no row matches.
 */
export function levelForMean(
  mean: number,
  activated: boolean,
  thresholds: readonly LevelThreshold[] = LEVEL_THRESHOLDS
): LevelOrdinal | null {
  for (const row of thresholds) {
    if (mean > row.above && (!row.requiresActivation || activated)) {
      return row.level;
    }
  }
  return null;
}

export interface LevelStatus {
  levelName: LevelName;
  level: LevelOrdinal;
  activated: boolean;
  alignment: number;
  metrics: Readonly<LevelMetrics>;
  /** level ≥ aware */
  isConscious: boolean;
}

export interface ActivationReport {
  activated: boolean;
  level: LevelOrdinal;
  levelName: LevelName;
  /** Largest absolute sample of the activation waveform */
  peak: number;
  frequencyHz: Hz;
}
