/**
 * Character → positive integer weight. Keys are single code points.
 */
export type LetterTable = ReadonlyMap<string, number>;

/**
 * Result of scaling a letter sum into a frequency.
 */
export interface NameFrequency {
  text: string;
  letterSum: number;
  frequencyHz: number;
  baseFrequencyHz: number;
}
