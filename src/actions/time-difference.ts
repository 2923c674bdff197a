/**
 * Clockwork MCP Action: time_difference
 */

import { z } from "zod";
import { toInteger } from "../calendar/coercion.js";
import { timeDifference as difference } from "../calendar/conversion.js";
import { IntegerLike, parseArgs } from "../utils/validation.js";

export const TimeDifferenceSchema = z.object({
  start_timestamp: IntegerLike,
  end_timestamp: IntegerLike,
});

export type TimeDifferenceInput = z.infer<typeof TimeDifferenceSchema>;

export interface TimeDifferenceOutput {
  /** end - start, in seconds */
  time_difference: number;
}

export async function timeDifference(
  args: unknown,
): Promise<TimeDifferenceOutput> {
  const input = parseArgs(TimeDifferenceSchema, args);
  const start = toInteger(input.start_timestamp, "start_timestamp");
  const end = toInteger(input.end_timestamp, "end_timestamp");

  return { time_difference: difference(start, end) };
}
