/**
 * Clockwork MCP Action: calculate_time_until_targets
 *
 * Resolves a JSON object of named targets. Each value is a timestamp
 * (number or digit string) or "next <weekday>". A bad entry is reported
 * under its own name as `{ error }` and never fails the batch; only a
 * `targets` string that is not a JSON object fails the whole call.
 */

import { DateTime } from "luxon";
import { z } from "zod";
import { parseTargetBatch, resolveTargets } from "../calendar/targets.js";
import type { TargetResult } from "../calendar/targets.js";
import { getChildLogger } from "../utils/logger.js";
import { OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";
import type { ActionContext } from "./context.js";

const logger = getChildLogger("action:calculate_time_until_targets");

export const CalculateTimeUntilTargetsSchema = z.object({
  targets: z.string(),
  timezone: OptionalTimezone,
});

export type CalculateTimeUntilTargetsInput = z.infer<
  typeof CalculateTimeUntilTargetsSchema
>;

export interface CalculateTimeUntilTargetsOutput {
  timezone: string;
  results: Record<string, TargetResult>;
}

export async function calculateTimeUntilTargets(
  args: unknown,
  context: ActionContext = {},
): Promise<CalculateTimeUntilTargetsOutput> {
  const input = parseArgs(CalculateTimeUntilTargetsSchema, args);
  const targets = parseTargetBatch(input.targets);
  const tz = resolveZone(input.timezone, logger);

  const results = resolveTargets(targets, tz.zone, context.now ?? DateTime.now());

  const failed = Object.entries(results)
    .filter(([, result]) => "error" in result)
    .map(([name]) => name);
  if (failed.length > 0) {
    logger.warn({ failed }, "Some targets could not be resolved");
  }

  return { timezone: tz.name, results };
}
