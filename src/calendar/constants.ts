/**
 * Shared calendar constants
 */

/** luxon pattern for `YYYY-MM-DD HH:MM:SS` */
export const TIME_FORMAT = "yyyy-MM-dd HH:mm:ss";

/** Human-facing name of TIME_FORMAT, used in error messages */
export const TIME_FORMAT_LABEL = "YYYY-MM-DD HH:MM:SS";

export const DEFAULT_TIMEZONE = "Asia/Shanghai";

export const SECONDS_IN_MINUTE = 60;
export const SECONDS_IN_HOUR = 3600;
export const SECONDS_IN_DAY = 86400;
export const SECONDS_IN_MONTH = 2629800; // 30.4375 days
export const SECONDS_IN_YEAR = 31557600; // 365.25 days

/** ISO order: index 0 is Monday, luxon weekday 1 */
export const WEEKDAY_NAMES = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];
