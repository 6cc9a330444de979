#!/usr/bin/env node

/**
 * MCP entry point for midi-graph-mcp-server.
 *
 * Opens the session described by the environment, registers tools and
 * starts the stdio transport.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./runtime/config.js";
import { createLogger } from "./runtime/logger.js";
import { Session } from "./runtime/session.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger("midi-graph", config.logLevel);
  const session = await Session.open(config, { logger });
  const server = createServer(session);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);
    session
      .shutdown()
      .then(() => server.close())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("shutdown failed", { error });
          process.exit(1);
        },
      );
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
