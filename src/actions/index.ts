/**
 * Clockwork MCP - Actions
 * Business logic behind each MCP tool
 */

export * from "./get-current-time.js";
export * from "./convert-timestamp-to-time.js";
export * from "./convert-time-to-timestamp.js";
export * from "./time-difference.js";
export * from "./time-difference-calculate.js";
export * from "./get-day-of-week.js";
export * from "./get-weekday-timestamps-for-week.js";
export * from "./time-until-next-date.js";
export * from "./calculate-time-until-targets.js";
