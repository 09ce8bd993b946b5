import type { NameFrequency } from "@lattice/contracts";
import { BASE_FREQUENCY } from "../constants/DerivedConstants";
import { ABJAD, type LetterValueMapper } from "./LetterValueMapper";

/**
 * Scales a letter sum into a frequency: (sum × base) ÷ 6, rounded to
 * two decimal places.
 *
 * @example
 * nameFrequency("البصير", ["ا", "ل"]) // { letterSum: 302, frequencyHz: 4535.42, ... }
 */
export function nameFrequency(
  text: string,
  excluded: Iterable<string> = [],
  mapper: LetterValueMapper = ABJAD
): NameFrequency {
  const letterSum = mapper.sum(text, excluded);
  const frequency = BASE_FREQUENCY.times(letterSum).div(6);

  return {
    text,
    letterSum,
    frequencyHz: frequency.toDecimalPlaces(2).toNumber(),
    baseFrequencyHz: BASE_FREQUENCY.toNumber(),
  };
}
