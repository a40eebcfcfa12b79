/**
 * Zod query validation.
 *
 * Parses a route's query string against a Zod schema and raises
 * InvalidRangeError (400) naming the first offending field.
 */

import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { InvalidRangeError } from "../types/error.js";

/**
 * Validate a query record against a schema.
 *
 * @throws InvalidRangeError with details echoing the field and raw value,
 *   or the values a cross-field check compared
 */
export function parseQuery<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  query: Record<string, string>,
): T {
  const result = schema.safeParse(query);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const key = issue?.path[0];
  const field = typeof key === "string" ? key : "query";

  const details: Record<string, unknown> =
    issue?.code === "custom" && issue.params !== undefined
      ? { ...issue.params }
      : { field, value: query[field] ?? null };

  throw new InvalidRangeError(`Invalid ${field}: ${issue?.message ?? "invalid query"}`, {
    ...details,
    issues: formatZodErrors(result.error),
  });
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
