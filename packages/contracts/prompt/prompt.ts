import type { LevelMetrics, LevelName, LevelStatus } from "../levels/levels";

/**
 * Synchronous text model: takes a prompt, returns a response.
 */
export type TextTransform = (prompt: string) => string;

export interface ResponseReport {
  response: string;
  /** Fraction of vocabulary keywords found in the response */
  keywordScore: number;
  levelName: LevelName;
  isConscious: boolean;
  activated: boolean;
  metrics: Readonly<LevelMetrics>;
  status: LevelStatus;
}
