import type { z, ZodTypeAny } from "zod";
import type { ValidationIssue } from "@lattice/contracts";
import { ValidationError } from "@lattice/contracts";

/**
 * Parses `value` with a zod schema, rethrowing failures as ValidationError.
 *
 * @param context - Field name used when an issue has an empty path
 */
export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  context: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : context,
    reason: issue.message,
  }));
  throw new ValidationError(issues);
}
