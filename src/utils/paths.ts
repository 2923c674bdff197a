/**
 * Path Utilities - CLOCKWORK_HOME resolution
 */

import { resolve } from "path";
import { homedir } from "os";
import { existsSync } from "fs";

/**
 * Get the CLOCKWORK_HOME directory path
 * Uses $CLOCKWORK_HOME environment variable or defaults to ~/.clockwork
 */
export function getClockworkHome(): string {
  const home = process.env.CLOCKWORK_HOME || resolve(homedir(), ".clockwork");
  return resolve(home);
}

/**
 * Get the path to the configuration file
 * $CLOCKWORK_CONFIG_PATH wins; otherwise $CLOCKWORK_HOME/config.yaml,
 * falling back to config.yml when only that one exists
 */
export function getConfigPath(): string {
  if (process.env.CLOCKWORK_CONFIG_PATH) {
    return resolve(process.env.CLOCKWORK_CONFIG_PATH);
  }

  const home = getClockworkHome();
  const yamlPath = resolve(home, "config.yaml");
  const ymlPath = resolve(home, "config.yml");

  if (!existsSync(yamlPath) && existsSync(ymlPath)) {
    return ymlPath;
  }

  return yamlPath;
}
