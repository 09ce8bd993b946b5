import Decimal from "decimal.js";

/**
 * Decimal constructor used for every ratio and frequency derivation.
 * Isolated from the global Decimal settings.
 */
export const HighPrecision = Decimal.clone({ precision: 50 });
