import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { MemoryStore } from "@hindsight/db";
import { createServer } from "../server.js";

const logger = pino({ level: "silent" });

let dir: string;
let dbPath: string;
let client: Client;

async function callTool(
  name: string,
  args: Record<string, unknown> = {},
): Promise<{ text: string; isError: boolean }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== "text") throw new Error(`Expected text content from ${name}`);
  return { text: first.text, isError: result.isError === true };
}

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), "hindsight-mcp-"));
  dbPath = join(dir, "db.sqlite");

  const store = MemoryStore.open(dbPath, {
    logger,
    now: () => new Date("2026-03-01T09:00:00.000Z"),
  });
  store.ensureSession("9f8e7d6c-aaaa", "claude", "/home/dev/payments");
  store.storeTurn({
    sessionId: "9f8e7d6c-aaaa",
    turnNumber: 1,
    userMessage: "stripe webhook signature fails",
    agentOutput: "Used the raw body.",
    title: "Verify Stripe webhook signatures on raw body",
    description: "- Switched to express.raw for /webhooks",
    tags: "payments, stripe, webhooks",
  });
  store.ensureSession("1a2b3c4d-bbbb", "codex", "/home/dev/blog");
  store.close();

  const server = createServer({ dbPath, logger });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("history tools", () => {
  it("registers the four tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_stats",
      "recent_sessions",
      "search_history",
      "session_detail",
    ]);
  });

  it("search_history returns ranked turns as JSON", async () => {
    const { text, isError } = await callTool("search_history", { query: "stripe webhook" });

    expect(isError).toBe(false);
    const hits: unknown = JSON.parse(text);
    expect(hits).toEqual([
      expect.objectContaining({
        sessionId: "9f8e7d6c-aaaa",
        turnNumber: 1,
        title: "Verify Stripe webhook signatures on raw body",
        workspacePath: "/home/dev/payments",
        source: "claude",
      }),
    ]);
  });

  it("search_history records the search for stats", async () => {
    await callTool("search_history", { query: "graphql" });
    const stats: unknown = JSON.parse((await callTool("get_stats")).text);

    expect(stats).toEqual({
      totalSessions: 2,
      sessionsBySource: { claude: 1, codex: 1 },
      totalTurns: 1,
      lastIndexed: "2026-03-01T09:00:00.000Z",
      totalSearches: 1,
      searchesWithHits: 0,
      avgResults: 0,
    });
  });

  it("recent_sessions filters by workspace", async () => {
    const sessions: unknown = JSON.parse(
      (await callTool("recent_sessions", { workspace: "blog" })).text,
    );
    expect(sessions).toEqual([
      expect.objectContaining({ sessionId: "1a2b3c4d-bbbb", source: "codex", turnCount: 0 }),
    ]);
  });

  it("session_detail resolves prefixes and reports misses as errors", async () => {
    const detail: unknown = JSON.parse((await callTool("session_detail", { session_id: "9f8e" })).text);
    expect(detail).toMatchObject({
      sessionId: "9f8e7d6c-aaaa",
      turns: [expect.objectContaining({ turnNumber: 1, tags: "payments, stripe, webhooks" })],
    });

    const missing = await callTool("session_detail", { session_id: "ffff" });
    expect(missing.isError).toBe(true);
    expect(missing.text).toBe('No session matches "ffff" (missing or ambiguous prefix).');
  });
});
