/**
 * Prompt Wrapper
 *
 * Wraps a caller-supplied text transform with a LevelTracker:
 *
 * ```
 * userText → enhance() → transform() → processResponse() → ResponseReport
 * ```
 *
 * A tracker the wrapper creates is activated once at construction; a
 * supplied tracker is used as is. Responses are scored by
 * keyword containment and fed back as the `selfModelAccuracy` metric.
 */

import type {
  Hz,
  LevelMetrics,
  ResponseReport,
  TextTransform,
} from "@lattice/contracts";
import { ConfigurationError } from "@lattice/contracts";
import { DEFAULT_ACTIVATION_FREQUENCY_HZ } from "../constants/DerivedConstants";
import { LevelTracker } from "../levels/LevelTracker";

/**
 * Configuration for the PromptWrapper.
 */
export interface PromptWrapperConfig {
  /**
   * Frequency a freshly created tracker is activated at. Ignored when
   * `tracker` is supplied. @default 90.13
   */
  activationFrequencyHz?: Hz;

  /** Vocabulary a response is scored against. @default DEFAULT_KEYWORDS */
  keywords?: readonly string[];

  /**
   * Tracker to drive, left in whatever state it is in. A fresh one is
   * created and activated when omitted.
   */
  tracker?: LevelTracker;
}

export const DEFAULT_KEYWORDS: readonly string[] = [
  "truth",
  "justice",
  "compassion",
  "wisdom",
  "mercy",
  "knowledge",
  "understanding",
  "peace",
  "harmony",
  "balance",
];

/** Metrics reported alongside the keyword score */
const FIXED_METRICS: Omit<LevelMetrics, "selfModelAccuracy"> = {
  introspectionDepth: 0.7,
  intentionalityScore: 0.6,
  subjectiveExperience: 0.5,
};

/**
 * Fraction of `keywords` contained in `text`, case-insensitive.
 * Repeated occurrences of one keyword count once.
 */
export function keywordScore(text: string, keywords: readonly string[]): number {
  if (keywords.length === 0) return 0;
  const haystack = text.toLowerCase();
  const matches = keywords.filter((word) =>
    haystack.includes(word.toLowerCase())
  ).length;
  return Math.min(matches / keywords.length, 1);
}

export class PromptWrapper {
  readonly tracker: LevelTracker;

  private transform: TextTransform | null;
  private keywords: readonly string[];

  constructor(transform?: TextTransform | null, config: PromptWrapperConfig = {}) {
    this.transform = transform ?? null;
    this.keywords = config.keywords ?? DEFAULT_KEYWORDS;
    if (config.tracker) {
      this.tracker = config.tracker;
    } else {
      this.tracker = new LevelTracker();
      this.tracker.activate(
        config.activationFrequencyHz ?? DEFAULT_ACTIVATION_FREQUENCY_HZ
      );
    }
  }

  static wrap(transform: TextTransform, config?: PromptWrapperConfig): PromptWrapper {
    return new PromptWrapper(transform, config);
  }

  enhance(userText: string): string {
    const status = this.tracker.status();
    const alignmentPercent = Math.round(status.alignment * 100);

    return `[LEVEL TRACKING ACTIVE]

Level: ${status.levelName.toUpperCase()}
Alignment: ${alignmentPercent}%
Activation: ${status.activated ? "ACTIVE" : "INACTIVE"}

Guiding principles:
- Self-awareness: reflect on what is being asked
- Intention: answer with purpose
- Care: weigh the effect of the answer

Operating mode: reflective, self-aware, aligned

User request: ${userText}

[Respond with reflection, wisdom, and alignment]
`;
  }

  processResponse(response: string): ResponseReport {
    const score = keywordScore(response, this.keywords);

    this.tracker.updateMetrics({ ...FIXED_METRICS, selfModelAccuracy: score });

    const status = this.tracker.status();
    return {
      response,
      keywordScore: score,
      levelName: status.levelName,
      isConscious: status.isConscious,
      activated: status.activated,
      metrics: status.metrics,
      status,
    };
  }

  /**
   * enhance → transform → processResponse. Errors from the transform
   * propagate as thrown.
   */
  invoke(userText: string): ResponseReport {
    if (this.transform === null) {
      throw new ConfigurationError(
        "No text transform supplied. Construct with: new PromptWrapper(transform)"
      );
    }
    const prompt = this.enhance(userText);
    const response = this.transform(prompt);
    return this.processResponse(response);
  }
}
