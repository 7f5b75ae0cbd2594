/**
 * @module mcp/tools/history
 * Session memory tools: full-text search, recent sessions, session detail and usage stats.
 * Each call opens the store, runs one read and closes it again.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "pino";
import { z } from "zod";
import { withStore, type MemoryStore } from "@hindsight/db";

export interface HistoryToolOptions {
  dbPath: string;
  logger: Logger;
}

function jsonContent(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Register all history tools on the given MCP server instance.
 *
 * @param server - The MCP server to register tools on
 * @param options - Database location and the logger each store call uses
 */
export function registerHistoryTools(server: McpServer, options: HistoryToolOptions): void {
  const { dbPath, logger } = options;
  const read = <T>(fn: (store: MemoryStore) => T): Promise<T> =>
    withStore(dbPath, { logger }, fn);

  // --- search_history ---
  server.tool(
    "search_history",
    "Search past coding sessions by keywords. Results are ranked by relevance, recency and workspace match.",
    {
      query: z.string().min(1).describe("Keywords; every word must match"),
      workspace: z.string().optional().describe("Workspace path substring to boost, e.g. the current project directory"),
      limit: z.number().int().min(1).max(50).default(10).describe("Max results (default 10, max 50)"),
    },
    async ({ query, workspace, limit }) => {
      const results = await read((store) => store.search(query, { workspace, limit }));
      logger.debug({ query, workspace, results: results.length }, "search_history");

      return jsonContent(
        results.map((r) => ({
          sessionId: r.sessionId,
          turnNumber: r.turnNumber,
          title: r.title,
          description: r.description,
          tags: r.tags,
          userMessage: r.userMessage,
          workspacePath: r.workspacePath,
          source: r.source,
          timestamp: r.timestamp,
          ageDays: r.ageDays,
          score: Math.round(r.score * 1000) / 1000,
        })),
      );
    },
  );

  // --- recent_sessions ---
  server.tool(
    "recent_sessions",
    "List the most recently started sessions, optionally limited to one workspace",
    {
      workspace: z.string().optional().describe("Only sessions whose workspace path contains this"),
      limit: z.number().int().min(1).max(50).default(10).describe("Max sessions (default 10, max 50)"),
    },
    async ({ workspace, limit }) =>
      jsonContent(await read((store) => store.recentSessions({ workspace, limit }))),
  );

  // --- session_detail ---
  server.tool(
    "session_detail",
    "Get one session with all of its turns, by full id or unique id prefix",
    {
      session_id: z.string().min(1).describe("Session id or unique prefix (at least a few characters)"),
    },
    async ({ session_id }) => {
      const detail = await read((store) => store.sessionDetail(session_id));
      if (!detail) {
        return {
          content: [{ type: "text" as const, text: `No session matches "${session_id}" (missing or ambiguous prefix).` }],
          isError: true,
        };
      }
      return jsonContent(detail);
    },
  );

  // --- get_stats ---
  server.tool(
    "get_stats",
    "Get memory store statistics: sessions by source, indexed turns, search hit rate",
    {},
    async () => jsonContent(await read((store) => store.stats())),
  );
}
