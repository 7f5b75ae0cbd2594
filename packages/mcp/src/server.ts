/**
 * @module mcp/server
 * Builds the Hindsight MCP server with its tools registered.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerHistoryTools, type HistoryToolOptions } from "./tools/history.js";

export const SERVER_NAME = "hindsight";
export const SERVER_VERSION = "0.1.0";

export function createServer(options: HistoryToolOptions): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerHistoryTools(server, options);
  return server;
}
