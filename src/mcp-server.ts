#!/usr/bin/env tsx
/**
 * mcp-server.ts - MCP server entry point for image-scout
 *
 * What is this file?
 * This is the entry point for the MCP (Model Context Protocol) server. An MCP
 * client spawns this process and calls the image tools over stdio.
 *
 * How it works:
 * 1. Load .env and validate configuration
 * 2. Build the ServiceContext and start warming up its dependencies in the
 *    background (database pools and the OCR worker take a moment to start)
 * 3. Register the tools and connect the stdio transport
 *
 * stdout carries JSON-RPC, so all progress output goes to stderr.
 */

import "dotenv/config";
// Initialize OpenTelemetry tracing before any other imports
import { shutdownTracing } from "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { ServiceContext } from "./context";
import { JobRunner } from "./pipeline";
import { registerImageTools } from "./tools/mcp";

const log = (message: string): void => console.error(message);

async function main(): Promise<void> {
  const config = loadConfig();
  const context = new ServiceContext(config);
  const jobs = new JobRunner({ onProgress: log });

  const server = new McpServer({
    name: "image-scout",
    version: "0.1.0",
  });
  registerImageTools(server, context, jobs, log);

  // Not awaited: tools that need a dependency wait for (or fail on) its
  // initialization themselves.
  void context.warmUp(log);

  const shutdown = (): void => {
    server
      .close()
      .then(() => context.close())
      .then(() => shutdownTracing())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Error during shutdown:", error);
          process.exit(1);
        }
      );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("MCP server error:", error);
  process.exit(1);
});
