/**
 * Clockwork MCP - Input Validation Helpers
 * Shape checks for raw tool arguments
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

/**
 * Accepts a native integer or a string; the string is parsed later by
 * the numeric coercion step so its error can name the value
 */
export const IntegerLike = z.union([z.number(), z.string()]);

export const OptionalTimezone = z.string().optional().nullable();

/**
 * Parse raw tool arguments against a zod object schema.
 *
 * Missing `arguments` are treated as an empty object. The first issue is
 * reported as an InvalidArgumentError naming its field.
 */
export function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown,
): z.infer<T> {
  const result = schema.safeParse(args ?? {});

  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  const value =
    field !== undefined && args !== null && typeof args === "object"
      ? Object.entries(args).find(([key]) => key === field)?.[1]
      : args;

  throw new InvalidArgumentError(
    field
      ? `Invalid argument '${field}': ${issue?.message ?? "invalid value"}`
      : `Invalid arguments: ${issue?.message ?? "invalid value"}`,
    field,
    value,
  );
}
