export { LetterValueMapper, ABJAD, type LetterEntries } from "./LetterValueMapper";
export { nameFrequency } from "./nameFrequency";
