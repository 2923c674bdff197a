/**
 * Clockwork MCP Action: get_day_of_week
 *
 * The weekday is read in the resolved timezone, so the default zone
 * applies when none is given. Pass "UTC" for the UTC calendar day.
 */

import { z } from "zod";
import { toInteger } from "../calendar/coercion.js";
import { dayOfWeek } from "../calendar/search.js";
import type { WeekdayName } from "../calendar/constants.js";
import { getChildLogger } from "../utils/logger.js";
import { IntegerLike, OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";

const logger = getChildLogger("action:get_day_of_week");

export const GetDayOfWeekSchema = z.object({
  timestamp: IntegerLike,
  timezone: OptionalTimezone,
});

export type GetDayOfWeekInput = z.infer<typeof GetDayOfWeekSchema>;

export interface GetDayOfWeekOutput {
  timestamp: number;
  timezone: string;
  day_of_week: WeekdayName;
}

export async function getDayOfWeek(args: unknown): Promise<GetDayOfWeekOutput> {
  const input = parseArgs(GetDayOfWeekSchema, args);
  const timestamp = toInteger(input.timestamp, "timestamp");
  const tz = resolveZone(input.timezone, logger);

  return {
    timestamp,
    timezone: tz.name,
    day_of_week: dayOfWeek(timestamp, tz.zone),
  };
}
