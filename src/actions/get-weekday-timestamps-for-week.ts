/**
 * Clockwork MCP Action: get_weekday_timestamps_for_week
 */

import { z } from "zod";
import { toInteger } from "../calendar/coercion.js";
import { weekTimestamps } from "../calendar/search.js";
import type { WeekTimestamps } from "../calendar/search.js";
import { getChildLogger } from "../utils/logger.js";
import { IntegerLike, OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";

const logger = getChildLogger("action:get_weekday_timestamps_for_week");

export const GetWeekdayTimestampsSchema = z.object({
  timestamp: IntegerLike,
  timezone: OptionalTimezone,
});

export type GetWeekdayTimestampsInput = z.infer<
  typeof GetWeekdayTimestampsSchema
>;

export interface GetWeekdayTimestampsOutput {
  reference_timestamp: number;
  timezone: string;
  /** Local midnight of Monday through Sunday */
  week_timestamps: WeekTimestamps;
}

export async function getWeekdayTimestampsForWeek(
  args: unknown,
): Promise<GetWeekdayTimestampsOutput> {
  const input = parseArgs(GetWeekdayTimestampsSchema, args);
  const timestamp = toInteger(input.timestamp, "timestamp");
  const tz = resolveZone(input.timezone, logger);

  return {
    reference_timestamp: timestamp,
    timezone: tz.name,
    week_timestamps: weekTimestamps(timestamp, tz.zone),
  };
}
