export interface RatioInput {
  numerator: number | string;
  divisor: number | string;
  reference: number | string;
}

export interface RatioReport {
  numerator: number;
  divisor: number;
  reference: number;
  ratio: number;
  /** |ratio - reference| */
  error: number;
  precisionPercent: number;
  /** Full-precision decimal strings */
  ratioText: string;
  precisionText: string;
}

export interface ConstantsReport {
  goldenRatio: RatioReport;
  baseFrequencyHz: number;
  successRate: number;
  /** precision > 99.9 % */
  validationPassed: boolean;
}

export interface RatioStep {
  step: number;
  description: string;
  value: number;
}
