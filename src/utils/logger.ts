/**
 * Clockwork MCP - Logging
 *
 * Pino-based structured logging. Every line goes to stderr: stdout is owned
 * by the MCP stdio transport.
 *
 * Context names follow a colon-separated convention:
 * - clockwork:cli, clockwork:mcp, clockwork:http
 * - action:get_current_time, action:time_until_next_date, etc.
 */

import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

/**
 * Pino log level type
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ObservabilityOptions {
  level?: LogLevel;
  /** Defaults to false under Vitest or NODE_ENV=test */
  enabled?: boolean;
}

let globalLogger: Logger | null = null;
const children = new Map<string, Logger>();

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.CLOCKWORK_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function isTestTooling(): boolean {
  return process.env.VITEST === "true" || process.env.NODE_ENV === "test";
}

/**
 * Initialize the root logger.
 *
 * Subsequent calls return the existing instance; use `setLogLevel` to
 * change verbosity after startup.
 */
export function initializeObservability(
  options: ObservabilityOptions = {},
): Logger {
  if (globalLogger) {
    return globalLogger;
  }

  globalLogger = pino(
    {
      level: options.level ?? levelFromEnv(),
      enabled: options.enabled ?? !isTestTooling(),
      base: { service: "clockwork-mcp" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );

  return globalLogger;
}

/**
 * Get child logger with hierarchical context
 *
 * Children are cached per context so `setLogLevel` can reach them.
 *
 * @example
 * ```typescript
 * const logger = getChildLogger('action:get_current_time');
 * logger.warn({ timezone }, 'Invalid timezone, using default');
 * ```
 */
export function getChildLogger(context: string): Logger {
  const existing = children.get(context);
  if (existing) {
    return existing;
  }

  const child = getLogger().child({ context });
  children.set(context, child);
  return child;
}

/**
 * Root logger without context binding.
 * Prefer `getChildLogger(context)` for most use cases.
 */
export function getLogger(): Logger {
  return globalLogger ?? initializeObservability();
}

/**
 * Apply a level to the root logger and every cached child
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}

/**
 * Flush pending log lines and drop the cached loggers
 */
export function shutdownObservability(): void {
  if (globalLogger) {
    globalLogger.info("Logger shutdown complete");
    globalLogger.flush();
  }

  children.clear();
  globalLogger = null;
}
