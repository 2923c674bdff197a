/**
 * Clockwork MCP Action: get_current_time
 * Current time in the requested timezone
 */

import { DateTime } from "luxon";
import { z } from "zod";
import { currentTime } from "../calendar/conversion.js";
import { getChildLogger } from "../utils/logger.js";
import { OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";
import type { ActionContext } from "./context.js";

const logger = getChildLogger("action:get_current_time");

export const GetCurrentTimeSchema = z.object({
  timezone: OptionalTimezone,
});

export type GetCurrentTimeInput = z.infer<typeof GetCurrentTimeSchema>;

export interface GetCurrentTimeOutput {
  /** Unix timestamp in seconds */
  timestamp: number;
  timezone: string;
  /** YYYY-MM-DD HH:MM:SS in `timezone` */
  current_time: string;
}

export async function getCurrentTime(
  args: unknown,
  context: ActionContext = {},
): Promise<GetCurrentTimeOutput> {
  const input = parseArgs(GetCurrentTimeSchema, args);
  const tz = resolveZone(input.timezone, logger);

  const { timestamp, time } = currentTime(tz.zone, context.now ?? DateTime.utc());

  logger.debug({ timezone: tz.name, timestamp }, "Current time retrieved");

  return { timestamp, timezone: tz.name, current_time: time };
}
