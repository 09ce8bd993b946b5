/**
 * Error hierarchy shared by every package.
 *
 * Each error carries a stable `code` so callers can branch without
 * `instanceof` checks across package boundaries.
 */

export type LatticeErrorCode =
  | "not-found"
  | "domain"
  | "configuration"
  | "validation";

export abstract class LatticeError extends Error {
  abstract readonly code: LatticeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Lookup of an identifier that is not in a fixed catalog.
 */
export class NotFoundError extends LatticeError {
  readonly code = "not-found";

  constructor(
    readonly entity: string,
    readonly id: string,
    readonly available: readonly string[]
  ) {
    super(`Unknown ${entity}: ${id}. Available: ${available.join(", ")}`);
  }
}

/**
 * Arithmetic with no defined result: division by zero, normalizing silence.
 */
export class DomainError extends LatticeError {
  readonly code = "domain";
}

/**
 * A collaborator required by the call was not supplied at construction.
 */
export class ConfigurationError extends LatticeError {
  readonly code = "configuration";
}

/**
 * One rejected input field.
 */
export interface ValidationIssue {
  /** Which field or parameter failed */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}

export class ValidationError extends LatticeError {
  readonly code = "validation";

  constructor(readonly issues: readonly ValidationIssue[]) {
    super(
      `Invalid input: ${issues
        .map((issue) => `${issue.field}: ${issue.reason}`)
        .join("; ")}`
    );
  }
}
