/**
 * Clockwork MCP Action: convert_time_to_timestamp
 * Parses YYYY-MM-DD HH:MM:SS as wall-clock time in the given timezone
 */

import { z } from "zod";
import { timeToTimestamp } from "../calendar/conversion.js";
import { getChildLogger } from "../utils/logger.js";
import { OptionalTimezone, parseArgs } from "../utils/validation.js";
import { resolveZone, toErr } from "./context.js";

const logger = getChildLogger("action:convert_time_to_timestamp");

export const ConvertTimeToTimestampSchema = z.object({
  time: z.string(),
  timezone: OptionalTimezone,
});

export type ConvertTimeToTimestampInput = z.infer<
  typeof ConvertTimeToTimestampSchema
>;

export interface ConvertTimeToTimestampOutput {
  timezone: string;
  timestamp: number;
}

export async function convertTimeToTimestamp(
  args: unknown,
): Promise<ConvertTimeToTimestampOutput> {
  const input = parseArgs(ConvertTimeToTimestampSchema, args);
  const tz = resolveZone(input.timezone, logger);

  try {
    return { timezone: tz.name, timestamp: timeToTimestamp(input.time, tz.zone) };
  } catch (error) {
    logger.debug({ err: toErr(error), time: input.time }, "Time string rejected");
    throw error;
  }
}
