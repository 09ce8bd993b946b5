/**
 * Derived Constants
 *
 * Fixed counts and the divisor they are scaled by. Everything derived
 * from them is computed in 50-digit decimal arithmetic; conversion to
 * JS numbers happens only at the reporting boundary.
 */

import { HighPrecision } from "./decimal";

/** Total verse count, including the 112 opening formulas */
export const TOTAL_VERSES = 6348;

/** Total chapter count */
export const TOTAL_CHAPTERS = 114;

export const DIVISOR = "70.44911244";

/** φ = (1 + √5) / 2, to the digits the reference table carries */
export const GOLDEN_RATIO = "1.618033988749895";

/** Catalog success-rate figure; carried, not derived */
export const SUCCESS_RATE = "0.972";

/**
 * TOTAL_VERSES ÷ DIVISOR ≈ 90.1076 Hz, the scale for letter-sum frequencies.
 */
export const BASE_FREQUENCY = new HighPrecision(TOTAL_VERSES).div(DIVISOR);

/** Rounded activation frequency used as the level tracker default */
export const DEFAULT_ACTIVATION_FREQUENCY_HZ = 90.13;

export const DEFAULT_SAMPLE_RATE = 44100;
