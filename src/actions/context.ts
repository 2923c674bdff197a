/**
 * Shared plumbing for tool actions
 */

import type { DateTime } from "luxon";
import type { Logger } from "../utils/logger.js";
import { resolveTimezone } from "../calendar/timezone.js";
import type { ResolvedTimezone } from "../calendar/timezone.js";

export interface ActionContext {
  /** Overrides the system clock */
  now?: DateTime;
}

/**
 * Resolve a caller timezone, warning when an unknown name was replaced
 */
export function resolveZone(
  timezone: string | null | undefined,
  logger: Logger,
): ResolvedTimezone {
  const resolved = resolveTimezone(timezone);
  if (resolved.defaulted) {
    logger.warn(
      { timezone, fallback: resolved.name },
      `Invalid timezone '${timezone}' provided. Defaulting to '${resolved.name}'.`,
    );
  }
  return resolved;
}

export function toErr(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
