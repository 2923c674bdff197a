/**
 * Numeric coercion for values that may arrive as text
 */

import { InvalidArgumentError } from "../utils/errors.js";

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Normalize an integer-or-string into a safe integer.
 *
 * @param field - Argument name reported when coercion fails
 */
export function toInteger(value: unknown, field: string): number {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return value;
  }

  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    const parsed = Number.parseInt(value, 10);
    if (Number.isSafeInteger(parsed)) {
      return parsed === 0 ? 0 : parsed;
    }
  }

  throw new InvalidArgumentError(
    `Invalid integer value for '${field}': ${JSON.stringify(value) ?? String(value)}`,
    field,
    value,
  );
}
