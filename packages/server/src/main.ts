#!/usr/bin/env tsx

/**
 * stdio entry point for the leadlink MCP server
 *
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import * as path from "node:path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { defaultRoot } from "@leadlink/sdk";
import { createServer } from "./server.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

async function main(): Promise<void> {
  // Stray console output on stdout would corrupt the protocol stream
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const readOnly = process.env.LEADLINK_READONLY === "true";
  if (readOnly) {
    logger.info("server.init", { mode: "readonly" });
  }

  const server = createServer({ readOnly });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_root: path.resolve(defaultRoot()),
  });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", { metrics: metrics.snapshot() });
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
