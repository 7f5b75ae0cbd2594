#!/usr/bin/env node
/**
 * @module mcp/index
 * Hindsight MCP server entrypoint. Parses CLI args, loads config, registers tools,
 * and starts the stdio transport.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createFileLogger, loadConfig } from "@hindsight/shared";
import { createServer } from "./server.js";

/** Parse `--key value` pairs from process.argv. */
function parseArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith("--") && i + 1 < argv.length) {
      args[argv[i].slice(2)] = argv[i + 1];
      i++;
    }
  }
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig(args["config"]);

  // stdout carries MCP JSON-RPC, so logs go to the log file
  const logger = createFileLogger(config, "mcp");

  const server = createServer({ dbPath: config.dbPath, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ dbPath: config.dbPath }, "MCP server started");
}

main().catch((err) => {
  console.error("[hindsight-mcp] Fatal:", err);
  process.exit(1);
});
