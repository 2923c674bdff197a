/**
 * Clockwork MCP Action: time_until_next_date
 * Next occurrence of a weekday or a day of month, and the seconds left
 */

import { DateTime } from "luxon";
import { z } from "zod";
import { nextOccurrence, parseNextTarget } from "../calendar/search.js";
import { getChildLogger } from "../utils/logger.js";
import { IntegerLike, OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";
import type { ActionContext } from "./context.js";

const logger = getChildLogger("action:time_until_next_date");

export const TimeUntilNextDateSchema = z.object({
  target: IntegerLike,
  timezone: OptionalTimezone,
});

export type TimeUntilNextDateInput = z.infer<typeof TimeUntilNextDateSchema>;

export interface TimeUntilNextDateOutput {
  target_day: number | string;
  timezone: string;
  next_occurrence_time: string;
  time_remaining_seconds: number;
}

export async function timeUntilNextDate(
  args: unknown,
  context: ActionContext = {},
): Promise<TimeUntilNextDateOutput> {
  const input = parseArgs(TimeUntilNextDateSchema, args);
  const target = parseNextTarget(input.target);
  const tz = resolveZone(input.timezone, logger);

  const occurrence = nextOccurrence(target, tz.zone, context.now ?? DateTime.now());

  logger.debug(
    { target: input.target, timezone: tz.name, next: occurrence.next_occurrence_time },
    "Next occurrence resolved",
  );

  return {
    target_day: input.target,
    timezone: tz.name,
    next_occurrence_time: occurrence.next_occurrence_time,
    time_remaining_seconds: occurrence.time_remaining_seconds,
  };
}
