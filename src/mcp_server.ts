/**
 * Clockwork MCP Server
 * Model Context Protocol server for timezone and calendar arithmetic
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import express from "express";
import type { Express } from "express";
import type { Server as HttpServer } from "http";

import {
  calculateTimeUntilTargets,
  convertTimeToTimestamp,
  convertTimestampToTime,
  getCurrentTime,
  getDayOfWeek,
  getWeekdayTimestampsForWeek,
  timeDifference,
  timeDifferenceCalculate,
  timeUntilNextDate,
} from "./actions/index.js";
import type { ActionContext } from "./actions/context.js";
import { DEFAULT_TIMEZONE } from "./calendar/constants.js";
import type { TransportType } from "./config/clockwork-config.js";
import { ClockworkError } from "./utils/errors.js";
import { getChildLogger, shutdownObservability } from "./utils/logger.js";
import { getPackageVersion } from "./utils/version.js";

const logger = getChildLogger("clockwork:mcp");

export const SERVER_NAME = "clockwork-mcp";
export const SERVER_VERSION = getPackageVersion();
export const SERVER_INSTRUCTIONS =
  "An MCP server for time-related operations like timezone conversion and timestamp calculations.";

const TIMEZONE_PROPERTY = {
  type: "string",
  description: `IANA timezone name (e.g., 'America/New_York'). Defaults to '${DEFAULT_TIMEZONE}'; unknown names fall back to the default.`,
};

const TIMESTAMP_PROPERTY = {
  type: ["integer", "string"],
  description: "Unix timestamp in seconds, as an integer or a string of digits",
};

// MCP Tool Definitions
export const TOOLS: Tool[] = [
  {
    name: "get_current_time",
    description: "Gets the current time in the specified timezone.",
    inputSchema: {
      type: "object",
      properties: {
        timezone: TIMEZONE_PROPERTY,
      },
    },
  },
  {
    name: "convert_timestamp_to_time",
    description:
      "Converts a Unix timestamp to a formatted time string (YYYY-MM-DD HH:MM:SS) in the specified timezone.",
    inputSchema: {
      type: "object",
      properties: {
        timestamp: TIMESTAMP_PROPERTY,
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["timestamp"],
    },
  },
  {
    name: "convert_time_to_timestamp",
    description:
      "Converts a formatted time string (YYYY-MM-DD HH:MM:SS) to a Unix timestamp, reading it as wall-clock time in the specified timezone.",
    inputSchema: {
      type: "object",
      properties: {
        time: {
          type: "string",
          description: "The time string to convert (format: YYYY-MM-DD HH:MM:SS)",
        },
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["time"],
    },
  },
  {
    name: "time_difference",
    description:
      "Calculates the difference in seconds between two Unix timestamps (end - start).",
    inputSchema: {
      type: "object",
      properties: {
        start_timestamp: TIMESTAMP_PROPERTY,
        end_timestamp: TIMESTAMP_PROPERTY,
      },
      required: ["start_timestamp", "end_timestamp"],
    },
  },
  {
    name: "time_difference_caculate",
    description:
      "Calculates the time length (years, months, days, hours, minutes, seconds) of a time difference in seconds.",
    inputSchema: {
      type: "object",
      properties: {
        time_difference: {
          type: ["integer", "string"],
          description: "The time difference in seconds",
        },
        mode: {
          type: "string",
          description:
            "'p' for progressive calculation, 's' for separate calculation. Defaults to 'p'.",
        },
      },
      required: ["time_difference"],
    },
  },
  {
    name: "get_day_of_week",
    description:
      "Returns the day of the week (e.g., Monday) of a Unix timestamp in the specified timezone.",
    inputSchema: {
      type: "object",
      properties: {
        timestamp: TIMESTAMP_PROPERTY,
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["timestamp"],
    },
  },
  {
    name: "get_weekday_timestamps_for_week",
    description:
      "Returns the midnight timestamp and date of Monday through Sunday for the week containing the given timestamp.",
    inputSchema: {
      type: "object",
      properties: {
        timestamp: TIMESTAMP_PROPERTY,
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["timestamp"],
    },
  },
  {
    name: "time_until_next_date",
    description:
      "Calculates the next occurrence of a day of the month (1-31) or a weekday name (e.g., 'Friday') and the seconds remaining until it.",
    inputSchema: {
      type: "object",
      properties: {
        target: {
          type: ["integer", "string"],
          description: "Day of month (1-31) or weekday name",
        },
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["target"],
    },
  },
  {
    name: "calculate_time_until_targets",
    description:
      "Calculates the time remaining until several named targets. " +
      'Takes a JSON object string such as {"launch": "1700000000", "standup": "next monday"}. ' +
      "Entries that cannot be resolved report an error without affecting the others.",
    inputSchema: {
      type: "object",
      properties: {
        targets: {
          type: "string",
          description:
            "JSON object mapping names to Unix timestamps or 'next <weekday>' expressions",
        },
        timezone: TIMEZONE_PROPERTY,
      },
      required: ["targets"],
    },
  },
];

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

export class ClockworkMcpServer {
  private server: Server;
  private context: ActionContext;
  private httpServer: HttpServer | null = null;
  /** Open SSE streams by session id; POST /messages is routed through these */
  private sseTransports = new Map<string, SSEServerTransport>();

  /**
   * @param context - Forwarded to every action; tests pin `now` here
   */
  constructor(context: ActionContext = {}) {
    this.context = context;
    this.server = this.createServer();
  }

  /**
   * The underlying SDK server, for connecting custom transports
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Run a tool by name against raw arguments
   */
  async callTool(name: string, args: unknown): Promise<unknown> {
    switch (name) {
      case "get_current_time":
        return getCurrentTime(args, this.context);
      case "convert_timestamp_to_time":
        return convertTimestampToTime(args);
      case "convert_time_to_timestamp":
        return convertTimeToTimestamp(args);
      case "time_difference":
        return timeDifference(args);
      case "time_difference_caculate":
        return timeDifferenceCalculate(args);
      case "get_day_of_week":
        return getDayOfWeek(args);
      case "get_weekday_timestamps_for_week":
        return getWeekdayTimestampsForWeek(args);
      case "time_until_next_date":
        return timeUntilNextDate(args, this.context);
      case "calculate_time_until_targets":
        return calculateTimeUntilTargets(args, this.context);
      default:
        throw new ClockworkError(`Unknown tool: ${name}`, "UNKNOWN_TOOL", 404);
    }
  }

  private createServer(): Server {
    const server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions: SERVER_INSTRUCTIONS,
      },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = await this.callTool(name, args);
        logger.debug({ tool: name }, `Tool ${name} succeeded`);
        return textResult(result);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        const code = error instanceof ClockworkError ? error.code : "INTERNAL_ERROR";

        if (error instanceof ClockworkError && error.statusCode < 500) {
          logger.warn({ tool: name, code, reason: err.message }, `Tool ${name} rejected input`);
        } else {
          logger.error({ err, tool: name }, `Tool ${name} failed`);
        }

        return textResult({ error: err.message, code, tool: name }, true);
      }
    });

    return server;
  }

  /**
   * Express app serving stateless streamable HTTP on /mcp plus /health
   */
  createHttpApp(): Express {
    const app = express();
    app.use(express.json());

    app.all("/mcp", async (req, res) => {
      logger.debug({ method: req.method, body: req.body }, "Received HTTP request");

      // Stateless mode: fresh server and transport per request
      const server = this.createServer();
      const httpTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on("close", () => {
        httpTransport.close().catch((error: unknown) => {
          logger.warn(
            { err: error instanceof Error ? error : new Error(String(error)) },
            "Failed to close HTTP transport",
          );
        });
        server.close().catch((error: unknown) => {
          logger.warn(
            { err: error instanceof Error ? error : new Error(String(error)) },
            "Failed to close request server",
          );
        });
      });

      try {
        await server.connect(httpTransport);
        await httpTransport.handleRequest(req, res, req.body);
      } catch (error) {
        logger.error(
          {
            err: error instanceof Error ? error : new Error(String(error)),
          },
          "Error handling MCP request",
        );
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: "2.0",
            error: {
              code: -32603,
              message: "Internal server error",
            },
            id: null,
          });
        }
      }
    });

    this.addHealthRoute(app, "http");

    return app;
  }

  /**
   * Express app serving the SSE transport: GET /sse opens a stream, and
   * POST /messages?sessionId=... delivers client messages to it
   */
  createSseApp(): Express {
    const app = express();
    app.use(express.json());

    app.get("/sse", async (_req, res) => {
      const server = this.createServer();
      const sseTransport = new SSEServerTransport("/messages", res);
      const { sessionId } = sseTransport;
      this.sseTransports.set(sessionId, sseTransport);

      logger.debug({ sessionId }, "SSE stream opened");

      res.on("close", () => {
        this.sseTransports.delete(sessionId);
        logger.debug({ sessionId }, "SSE stream closed");
        server.close().catch((error: unknown) => {
          logger.warn(
            { err: error instanceof Error ? error : new Error(String(error)) },
            "Failed to close SSE session server",
          );
        });
      });

      try {
        await server.connect(sseTransport);
      } catch (error) {
        this.sseTransports.delete(sessionId);
        logger.error(
          {
            err: error instanceof Error ? error : new Error(String(error)),
            sessionId,
          },
          "Error opening SSE stream",
        );
        if (!res.headersSent) {
          res.status(500).end();
        }
      }
    });

    app.post("/messages", async (req, res) => {
      const sessionId =
        typeof req.query.sessionId === "string" ? req.query.sessionId : undefined;
      const sseTransport = sessionId
        ? this.sseTransports.get(sessionId)
        : undefined;

      if (!sseTransport) {
        logger.warn({ sessionId }, "Message for unknown SSE session");
        res.status(400).json({
          error: `No SSE session found for sessionId ${sessionId ?? "(missing)"}`,
        });
        return;
      }

      try {
        await sseTransport.handlePostMessage(req, res, req.body);
      } catch (error) {
        logger.error(
          {
            err: error instanceof Error ? error : new Error(String(error)),
            sessionId,
          },
          "Error handling SSE message",
        );
        if (!res.headersSent) {
          res.status(500).end();
        }
      }
    });

    this.addHealthRoute(app, "sse");

    return app;
  }

  private addHealthRoute(app: Express, transport: TransportType): void {
    app.get("/health", (_req, res) => {
      res.json({
        status: "ok",
        transport,
        server: SERVER_NAME,
        version: SERVER_VERSION,
      });
    });
  }

  async run(
    transport: TransportType = "http",
    port: number = 8000,
    host: string = "0.0.0.0",
  ): Promise<void> {
    if (transport === "http" || transport === "sse") {
      const app =
        transport === "http" ? this.createHttpApp() : this.createSseApp();
      const endpoint = transport === "http" ? "/mcp" : "/sse";

      this.httpServer = app
        .listen(port, host, () => {
          logger.info(
            `Clockwork MCP Server running on http://${host}:${port} (${transport})`,
          );
          logger.info(`MCP endpoint: http://${host}:${port}${endpoint}`);
          logger.info(`Health check: http://${host}:${port}/health`);
        })
        .on("error", (error) => {
          logger.error(
            {
              err: error instanceof Error ? error : new Error(String(error)),
            },
            "HTTP server error",
          );
          process.exit(1);
        });
    } else {
      const stdioTransport = new StdioServerTransport();
      await this.server.connect(stdioTransport);
      logger.info("Clockwork MCP Server running on stdio");
    }

    process.on("SIGINT", () => this.shutdown());
    process.on("SIGTERM", () => this.shutdown());
  }

  /**
   * Stop listening, close the MCP server and flush the logger
   */
  async close(): Promise<void> {
    const httpServer = this.httpServer;
    this.httpServer = null;

    if (httpServer) {
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }

    await this.server.close();
    logger.info("Shutdown complete");
    shutdownObservability();
  }

  private shutdown(): void {
    logger.info("Shutting down Clockwork MCP Server...");

    this.close()
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error(
          {
            err: error instanceof Error ? error : new Error(String(error)),
          },
          "Error during shutdown",
        );
        process.exit(1);
      });
  }
}

export default ClockworkMcpServer;
