/**
 * Clockwork MCP Action: convert_timestamp_to_time
 */

import { z } from "zod";
import { toInteger } from "../calendar/coercion.js";
import { timestampToTime } from "../calendar/conversion.js";
import { getChildLogger } from "../utils/logger.js";
import { IntegerLike, OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone } from "./context.js";

const logger = getChildLogger("action:convert_timestamp_to_time");

export const ConvertTimestampToTimeSchema = z.object({
  timestamp: IntegerLike,
  timezone: OptionalTimezone,
});

export type ConvertTimestampToTimeInput = z.infer<
  typeof ConvertTimestampToTimeSchema
>;

export interface ConvertTimestampToTimeOutput {
  timezone: string;
  time: string;
}

export async function convertTimestampToTime(
  args: unknown,
): Promise<ConvertTimestampToTimeOutput> {
  const input = parseArgs(ConvertTimestampToTimeSchema, args);
  const timestamp = toInteger(input.timestamp, "timestamp");
  const tz = resolveZone(input.timezone, logger);

  return { timezone: tz.name, time: timestampToTime(timestamp, tz.zone) };
}
