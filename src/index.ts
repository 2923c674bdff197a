#!/usr/bin/env node

/**
 * Clockwork MCP CLI
 * Command-line interface for the Clockwork MCP server
 */

import { Command } from "commander";
import { getConfigManager } from "./config/clockwork-config.js";
import type { ClockworkConfig } from "./config/clockwork-config.js";
import { ClockworkMcpServer } from "./mcp_server.js";
import { getChildLogger, initializeObservability, setLogLevel } from "./utils/logger.js";
import { getClockworkHome } from "./utils/paths.js";
import { getPackageVersion } from "./utils/version.js";

initializeObservability();

const logger = getChildLogger("clockwork:cli");

interface StartOptions {
  transport?: string;
  port?: string;
  host?: string;
}

function loadConfig(): ClockworkConfig {
  const configManager = getConfigManager();
  const config = configManager.load();
  setLogLevel(config.settings.logLevel);

  logger.info(
    {
      clockworkHome: getClockworkHome(),
      configPath: configManager.getConfigPath(),
      settings: config.settings,
    },
    "Configuration loaded",
  );

  return config;
}

async function start(options: StartOptions): Promise<void> {
  const config = loadConfig();

  const transport = options.transport ?? config.settings.defaultTransport;
  const port = options.port
    ? Number.parseInt(options.port, 10)
    : config.settings.httpPort;
  const host = options.host ?? config.settings.host;

  if (transport !== "stdio" && transport !== "http" && transport !== "sse") {
    logger.error(
      `Invalid transport type: ${transport}. Must be 'stdio', 'http' or 'sse'`,
    );
    process.exit(1);
  }

  if (transport !== "stdio" && (Number.isNaN(port) || port < 1 || port > 65535)) {
    logger.error(
      `Invalid port number: ${options.port}. Must be between 1 and 65535`,
    );
    process.exit(1);
  }

  const mcpServer = new ClockworkMcpServer();
  await mcpServer.run(transport, port, host);
}

const program = new Command();

program
  .name("clockwork")
  .description("Clockwork MCP - timezone and calendar arithmetic tools")
  .version(getPackageVersion());

program
  .command("start")
  .description("Start the Clockwork MCP server")
  .option("-t, --transport <type>", "Transport type (stdio, http or sse)")
  .option("-p, --port <number>", "HTTP server port (default: 8000)")
  .option("-H, --host <host>", "HTTP bind address (default: 0.0.0.0)")
  .action(async (options: StartOptions) => {
    try {
      await start(options);
    } catch (error) {
      logger.error(
        {
          err: error instanceof Error ? error : new Error(String(error)),
        },
        "Fatal error",
      );
      process.exit(1);
    }
  });

program.action(() => {
  program.help();
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(
    {
      err: error instanceof Error ? error : new Error(String(error)),
    },
    "Command failed",
  );
  process.exit(1);
});
