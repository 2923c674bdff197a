/**
 * Duration decomposition into years/months/days/hours/minutes/seconds
 */

import {
  SECONDS_IN_DAY,
  SECONDS_IN_HOUR,
  SECONDS_IN_MINUTE,
  SECONDS_IN_MONTH,
  SECONDS_IN_YEAR,
} from "./constants.js";

export type DecompositionMode = "p" | "s";

export const DEFAULT_MODE: DecompositionMode = "p";

export interface DurationBreakdown {
  time_difference: number;
  years: number;
  months: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export interface ResolvedMode {
  mode: DecompositionMode;
  defaulted: boolean;
}

/**
 * `p` and `s` are accepted case-insensitively; anything else falls back
 * to progressive
 */
export function resolveMode(mode?: string | null): ResolvedMode {
  if (mode === undefined || mode === null || mode === "") {
    return { mode: DEFAULT_MODE, defaulted: false };
  }

  const normalized = mode.trim().toLowerCase();
  if (normalized === "p" || normalized === "s") {
    return { mode: normalized, defaulted: false };
  }

  return { mode: DEFAULT_MODE, defaulted: true };
}

/**
 * Every unit is an independent view of the full duration
 */
export function decomposeSeparate(duration: number): DurationBreakdown {
  return {
    time_difference: duration,
    years: duration / SECONDS_IN_YEAR,
    months: duration / SECONDS_IN_MONTH,
    days: duration / SECONDS_IN_DAY,
    hours: duration / SECONDS_IN_HOUR,
    minutes: duration / SECONDS_IN_MINUTE,
    seconds: duration,
  };
}

/**
 * Greedy breakdown of |duration| from years down to seconds, with the
 * sign of the input applied to every non-zero component
 */
export function decomposeProgressive(duration: number): DurationBreakdown {
  const sign = duration < 0 ? -1 : 1;
  let remaining = Math.abs(duration);

  const take = (unit: number): number => {
    const count = Math.floor(remaining / unit);
    remaining -= count * unit;
    return count === 0 ? 0 : count * sign;
  };

  const years = take(SECONDS_IN_YEAR);
  const months = take(SECONDS_IN_MONTH);
  const days = take(SECONDS_IN_DAY);
  const hours = take(SECONDS_IN_HOUR);
  const minutes = take(SECONDS_IN_MINUTE);
  const seconds = remaining === 0 ? 0 : remaining * sign;

  return { time_difference: duration, years, months, days, hours, minutes, seconds };
}

export function decompose(
  duration: number,
  mode: DecompositionMode = DEFAULT_MODE,
): DurationBreakdown {
  return mode === "s" ? decomposeSeparate(duration) : decomposeProgressive(duration);
}
