export type Hz = number;
export type Seconds = number;
export type Minutes = number;
export type Days = number;
export type SampleRate = number; // samples per second
export type UnitInterval = number; // 0..1
