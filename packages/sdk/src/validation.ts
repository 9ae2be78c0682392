import type { z } from "zod";

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @param createError - Builds the thrown error from the formatted issues;
 *   defaults to a plain {@link Error}.
 * @throws Error when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
  createError: (message: string, issues: string[]) => Error = (message) => new Error(message),
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw createError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/** Formats zod issues as `path: message`, using `(root)` for the top level. */
export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });
