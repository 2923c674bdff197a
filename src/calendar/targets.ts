/**
 * Batch resolution of named targets with per-entry failures
 */

import { DateTime } from "luxon";
import type { Zone } from "luxon";
import { InvalidArgumentError } from "../utils/errors.js";
import { toInteger } from "./coercion.js";
import { formatTime, fromTimestamp, toEpochSeconds } from "./conversion.js";
import { nextWeekday, parseWeekday } from "./search.js";

export type TargetSpec =
  | { kind: "timestamp"; timestamp: number }
  | { kind: "relative-weekday"; weekday: number };

export interface TimestampTargetResult {
  target: unknown;
  target_time: string;
  time_remaining_seconds: number;
}

export interface RelativeWeekdayResult {
  target: unknown;
  next_occurrence_time: string;
  time_remaining_seconds: number;
}

export interface TargetError {
  error: string;
}

export type TargetResult =
  | TimestampTargetResult
  | RelativeWeekdayResult
  | TargetError;

const NEXT_PATTERN = /^\s*next\b\s*(.*?)\s*$/i;

/**
 * Decode the batch argument. Anything but a JSON object fails the call.
 */
export function parseTargetBatch(targets: string): Record<string, unknown> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(targets);
  } catch (error) {
    throw new InvalidArgumentError(
      `Invalid JSON for 'targets': ${error instanceof Error ? error.message : String(error)}`,
      "targets",
      targets,
    );
  }

  if (decoded === null || typeof decoded !== "object" || Array.isArray(decoded)) {
    throw new InvalidArgumentError(
      "'targets' must be a JSON object mapping names to targets",
      "targets",
      targets,
    );
  }

  return Object.fromEntries(Object.entries(decoded));
}

/**
 * Classify one entry value; `name` is used in error messages
 */
export function parseTargetSpec(name: string, value: unknown): TargetSpec {
  if (typeof value === "string") {
    const match = NEXT_PATTERN.exec(value);
    if (match) {
      const weekdayName = match[1] ?? "";
      const weekday = parseWeekday(weekdayName);
      if (weekday === undefined) {
        throw new InvalidArgumentError(
          `Invalid relative target '${value}': expected 'next <weekday>'`,
          name,
          value,
        );
      }
      return { kind: "relative-weekday", weekday };
    }
  }

  return { kind: "timestamp", timestamp: toInteger(value, name) };
}

export function resolveTarget(
  name: string,
  value: unknown,
  zone: Zone,
  now: DateTime,
): TargetResult {
  const spec = parseTargetSpec(name, value);

  switch (spec.kind) {
    case "relative-weekday": {
      const occurrence = nextWeekday(spec.weekday, zone, now);
      return {
        target: value,
        next_occurrence_time: occurrence.next_occurrence_time,
        time_remaining_seconds: occurrence.time_remaining_seconds,
      };
    }
    case "timestamp": {
      const targetTime = fromTimestamp(spec.timestamp, zone, name);
      return {
        target: value,
        target_time: formatTime(targetTime),
        time_remaining_seconds: spec.timestamp - toEpochSeconds(now),
      };
    }
  }
}

/**
 * Resolve every entry; a failing entry yields `{ error }` under its name
 * and leaves the others untouched
 */
export function resolveTargets(
  targets: Record<string, unknown>,
  zone: Zone,
  now: DateTime = DateTime.now(),
): Record<string, TargetResult> {
  return Object.fromEntries(
    Object.entries(targets).map(([name, value]): [string, TargetResult] => {
      try {
        return [name, resolveTarget(name, value, zone, now)];
      } catch (error) {
        return [
          name,
          { error: error instanceof Error ? error.message : String(error) },
        ];
      }
    }),
  );
}
