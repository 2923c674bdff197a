/**
 * Calendar search: day of week, week boundaries and next occurrences
 */

import { DateTime } from "luxon";
import type { Zone } from "luxon";
import { InvalidArgumentError } from "../utils/errors.js";
import { WEEKDAY_NAMES } from "./constants.js";
import type { WeekdayName } from "./constants.js";
import { formatTime, fromTimestamp, toEpochSeconds } from "./conversion.js";

export interface DayStamp {
  timestamp: number;
  date: string;
}

export type WeekTimestamps = Record<WeekdayName, DayStamp>;

export interface Occurrence {
  next_occurrence_time: string;
  time_remaining_seconds: number;
}

/** Monday = 0 .. Sunday = 6 */
export function weekdayIndex(dt: DateTime): number {
  return dt.weekday - 1;
}

/**
 * Case-insensitive lookup of an English weekday name
 */
export function parseWeekday(name: string): number | undefined {
  const normalized = name.trim().toLowerCase();
  const index = WEEKDAY_NAMES.findIndex((day) => day.toLowerCase() === normalized);
  return index === -1 ? undefined : index;
}

export function dayOfWeek(timestamp: number, zone: Zone): WeekdayName {
  return WEEKDAY_NAMES[weekdayIndex(fromTimestamp(timestamp, zone))];
}

/**
 * Local midnight of every day in the Monday-first week containing `timestamp`.
 * Each day is snapped to its own start, since a zone can skip midnight on
 * one day and not on the others.
 */
export function weekTimestamps(timestamp: number, zone: Zone): WeekTimestamps {
  const reference = fromTimestamp(timestamp, zone);
  const monday = reference.minus({ days: weekdayIndex(reference) }).startOf("day");

  const stamp = (offset: number): DayStamp => {
    const day = monday.plus({ days: offset }).startOf("day");
    return { timestamp: toEpochSeconds(day), date: formatTime(day) };
  };

  return {
    Monday: stamp(0),
    Tuesday: stamp(1),
    Wednesday: stamp(2),
    Thursday: stamp(3),
    Friday: stamp(4),
    Saturday: stamp(5),
    Sunday: stamp(6),
  };
}

function toOccurrence(at: DateTime, now: DateTime): Occurrence {
  return {
    next_occurrence_time: formatTime(at),
    time_remaining_seconds: Math.trunc((at.toMillis() - now.toMillis()) / 1000),
  };
}

/**
 * Next local midnight falling on `weekday` (Monday = 0). Today's midnight
 * has already passed unless `now` is exactly midnight, so that case moves a
 * full week ahead.
 */
export function nextWeekday(
  weekday: number,
  zone: Zone,
  now: DateTime = DateTime.now(),
): Occurrence {
  const local = now.setZone(zone);
  const daysAhead = (weekday - weekdayIndex(local) + 7) % 7;

  let candidate = local.plus({ days: daysAhead }).startOf("day");
  if (candidate.toMillis() < local.toMillis()) {
    candidate = candidate.plus({ days: 7 });
  }

  return toOccurrence(candidate, local);
}

/**
 * Next local midnight of day-of-month `day` strictly after `now`, skipping
 * months that do not have that day
 */
export function nextDayOfMonth(
  day: number,
  zone: Zone,
  now: DateTime = DateTime.now(),
): Occurrence {
  if (!Number.isInteger(day) || day < 1 || day > 31) {
    throw new InvalidArgumentError(
      `Day of month must be between 1 and 31, got ${day}`,
      "target",
      day,
    );
  }

  const local = now.setZone(zone);
  let { year, month } = local;

  // Any day 1-31 recurs within 12 months of any starting month
  for (let attempt = 0; attempt <= 12; attempt++) {
    const candidate = DateTime.fromObject({ year, month, day }, { zone });
    if (candidate.isValid && candidate.toMillis() > local.toMillis()) {
      return toOccurrence(candidate, local);
    }

    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }

  throw new InvalidArgumentError(
    `No upcoming date found for day of month ${day}`,
    "target",
    day,
  );
}

export type NextTarget =
  | { kind: "weekday"; weekday: number }
  | { kind: "day-of-month"; day: number };

/**
 * Interpret a `time_until_next_date` target: weekday names, or a
 * day-of-month given as an integer or a string of digits
 */
export function parseNextTarget(target: unknown): NextTarget {
  if (typeof target === "string") {
    const weekday = parseWeekday(target);
    if (weekday !== undefined) {
      return { kind: "weekday", weekday };
    }
    if (/^\s*[+-]?\d+\s*$/.test(target)) {
      return { kind: "day-of-month", day: Number.parseInt(target, 10) };
    }
  }

  if (typeof target === "number" && Number.isInteger(target)) {
    return { kind: "day-of-month", day: target };
  }

  throw new InvalidArgumentError(
    `Invalid target ${JSON.stringify(target)}: expected a weekday name or a day of month (1-31)`,
    "target",
    target,
  );
}

export function nextOccurrence(
  target: NextTarget,
  zone: Zone,
  now: DateTime = DateTime.now(),
): Occurrence {
  return target.kind === "weekday"
    ? nextWeekday(target.weekday, zone, now)
    : nextDayOfMonth(target.day, zone, now);
}
