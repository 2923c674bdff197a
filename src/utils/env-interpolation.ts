/**
 * Environment Variable Interpolation
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax in config values
 */

/**
 * Interpolate environment variables in a string value
 *
 * - ${VAR_NAME}          - Required variable (throws if not set)
 * - ${VAR_NAME:-default} - Optional variable with default value
 *
 * @example
 * ```typescript
 * interpolateString("${PORT:-8000}")  // "8000" (if PORT not set)
 * interpolateString("${MISSING}")     // throws Error
 * ```
 */
export function interpolateString(value: string, throwOnMissing = true): string {
  const pattern = /\$\{([^}:]+)(?::-([ -~]*?))?\}/g;

  return value.replace(
    pattern,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      if (throwOnMissing) {
        throw new Error(
          `Environment variable "${varName}" is required but not set. ` +
            `Set it or provide a default value using \${${varName}:-default} syntax.`,
        );
      }

      return match;
    },
  );
}

/**
 * Recursively interpolate environment variables in parsed YAML
 *
 * Arrays and nested objects are walked; numbers, booleans and null pass
 * through. Returns a new value and never mutates the input.
 */
export function interpolateObject(value: unknown, throwOnMissing = true): unknown {
  if (typeof value === "string") {
    return interpolateString(value, throwOnMissing);
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolateObject(item, throwOnMissing));
  }

  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateObject(entry, throwOnMissing);
    }
    return result;
  }

  return value;
}
