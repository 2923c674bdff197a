/**
 * Timestamp <-> formatted string conversions
 */

import { DateTime } from "luxon";
import type { Zone } from "luxon";
import { FormatMismatchError, InvalidArgumentError } from "../utils/errors.js";
import { TIME_FORMAT, TIME_FORMAT_LABEL } from "./constants.js";

const TIME_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/** Whole epoch seconds of an instant (floored) */
export function toEpochSeconds(dt: DateTime): number {
  return Math.floor(dt.toMillis() / 1000);
}

export function formatTime(dt: DateTime): string {
  return dt.toFormat(TIME_FORMAT);
}

/**
 * Build the zoned instant for an epoch-seconds timestamp.
 * Throws InvalidArgumentError outside the representable range.
 */
export function fromTimestamp(
  timestamp: number,
  zone: Zone,
  field = "timestamp",
): DateTime {
  const dt = DateTime.fromMillis(timestamp * 1000, { zone });
  if (!dt.isValid) {
    throw new InvalidArgumentError(
      `Timestamp out of range for '${field}': ${timestamp}`,
      field,
      timestamp,
    );
  }
  return dt;
}

export function timestampToTime(timestamp: number, zone: Zone): string {
  return formatTime(fromTimestamp(timestamp, zone));
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` as wall-clock fields in `zone`
 */
export function timeToTimestamp(time: string, zone: Zone): number {
  if (!TIME_PATTERN.test(time)) {
    throw new FormatMismatchError(time, TIME_FORMAT_LABEL);
  }

  const dt = DateTime.fromFormat(time, TIME_FORMAT, { zone });
  // Year 0000 parses but is not a calendar year
  if (!dt.isValid || dt.year < 1) {
    throw new FormatMismatchError(time, TIME_FORMAT_LABEL);
  }

  return toEpochSeconds(dt);
}

export function currentTime(
  zone: Zone,
  now: DateTime = DateTime.utc(),
): { timestamp: number; time: string } {
  const local = now.setZone(zone);
  return { timestamp: toEpochSeconds(local), time: formatTime(local) };
}

export function timeDifference(start: number, end: number): number {
  return end - start;
}
