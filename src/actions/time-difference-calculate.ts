/**
 * Clockwork MCP Action: time_difference_caculate
 * Breaks a duration in seconds into years, months, days, hours, minutes
 * and seconds
 */

import { z } from "zod";
import { toInteger } from "../calendar/coercion.js";
import { decompose, resolveMode } from "../calendar/duration.js";
import type { DurationBreakdown } from "../calendar/duration.js";
import { getChildLogger } from "../utils/logger.js";
import { IntegerLike, parseArgs } from "../utils/validation.js";

const logger = getChildLogger("action:time_difference_caculate");

export const TimeDifferenceCalculateSchema = z.object({
  time_difference: IntegerLike,
  mode: z.string().optional().nullable(),
});

export type TimeDifferenceCalculateInput = z.infer<
  typeof TimeDifferenceCalculateSchema
>;

export type TimeDifferenceCalculateOutput = DurationBreakdown;

export async function timeDifferenceCalculate(
  args: unknown,
): Promise<TimeDifferenceCalculateOutput> {
  const input = parseArgs(TimeDifferenceCalculateSchema, args);
  const duration = toInteger(input.time_difference, "time_difference");

  const { mode, defaulted } = resolveMode(input.mode);
  if (defaulted) {
    logger.warn(
      { mode: input.mode },
      `Invalid mode '${input.mode}' provided. Defaulting to 'p' (progressive).`,
    );
  }

  return decompose(duration, mode);
}
