/**
 * Clockwork MCP - Configuration Loader
 * Loads and validates config.yaml with Zod
 */

import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "../utils/errors.js";
import { LOG_LEVELS } from "../utils/logger.js";
import { getConfigPath } from "../utils/paths.js";
import { interpolateObject } from "../utils/env-interpolation.js";

const SettingsSchema = z.object({
  host: z.string().min(1, "Host cannot be empty").optional().default("0.0.0.0"),
  httpPort: z.coerce.number().int().min(1).max(65535).optional().default(8000),
  defaultTransport: z.enum(["stdio", "http", "sse"]).optional().default("http"),
  logLevel: z.enum(LOG_LEVELS).optional().default("info"),
});

const ClockworkConfigSchema = z.object({
  settings: SettingsSchema.optional().default({}),
});

export type ClockworkSettings = z.infer<typeof SettingsSchema>;
export type ClockworkConfig = z.infer<typeof ClockworkConfigSchema>;
export type TransportType = ClockworkSettings["defaultTransport"];

export class ClockworkConfigManager {
  private config: ClockworkConfig | null = null;
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getConfigPath();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file; a missing file yields defaults
   */
  load(): ClockworkConfig {
    try {
      let raw: unknown = {};

      if (existsSync(this.configPath)) {
        const content = readFileSync(this.configPath, "utf8");
        raw = interpolateObject(parseYaml(content) ?? {}, true);
      }

      this.config = ClockworkConfigSchema.parse(raw);
      return this.config;
    } catch (error) {
      if (error instanceof z.ZodError) {
        const messages = error.errors.map(
          (e) => `${e.path.join(".")}: ${e.message}`,
        );
        throw new ConfigurationError(
          `Configuration validation failed:\n${messages.join("\n")}`,
        );
      }

      if (error instanceof Error && error.name === "YAMLParseError") {
        throw new ConfigurationError(
          `Invalid YAML in configuration file: ${error.message}`,
        );
      }

      if (
        error instanceof Error &&
        error.message.includes("Environment variable")
      ) {
        throw new ConfigurationError(error.message);
      }

      throw error;
    }
  }

  /**
   * Get current configuration (throws if not loaded)
   */
  getConfig(): ClockworkConfig {
    if (!this.config) {
      throw new ConfigurationError(
        "Configuration not loaded. Call load() first.",
      );
    }
    return this.config;
  }
}

let configManager: ClockworkConfigManager | null = null;

export function getConfigManager(configPath?: string): ClockworkConfigManager {
  if (!configManager) {
    configManager = new ClockworkConfigManager(configPath);
  }
  return configManager;
}
