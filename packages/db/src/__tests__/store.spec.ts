import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import type { StoreTurnInput } from "@hindsight/shared";
import { applySchema, createDb, type DbConnection } from "../client.js";
import { MemoryStore, withStore } from "../store.js";

const logger = pino({ level: "silent" });

let conn: DbConnection;
let store: MemoryStore;
let clock: Date;

function turn(
  sessionId: string,
  turnNumber: number,
  overrides: Partial<StoreTurnInput> = {},
): StoreTurnInput {
  return {
    sessionId,
    turnNumber,
    userMessage: `prompt ${turnNumber}`,
    agentOutput: `output ${turnNumber}`,
    title: `Turn ${turnNumber}`,
    description: "- did a thing",
    tags: "misc",
    modelName: "haiku",
    ...overrides,
  };
}

function turnRowCount(sessionId: string): number {
  return (
    conn.sqlite
      .prepare("SELECT COUNT(*) AS c FROM turns WHERE session_id = ?")
      .get(sessionId) as { c: number }
  ).c;
}

function assertFtsConsistent(): void {
  conn.sqlite.exec("INSERT INTO turns_fts(turns_fts) VALUES ('integrity-check')");
}

function lastSearchLog(): { query: string; result_count: number; workspace: string | null } {
  return conn.sqlite
    .prepare("SELECT query, result_count, workspace FROM search_log ORDER BY id DESC LIMIT 1")
    .get() as { query: string; result_count: number; workspace: string | null };
}

beforeEach(() => {
  clock = new Date("2026-03-01T12:00:00.000Z");
  conn = createDb(":memory:");
  applySchema(conn.sqlite);
  store = new MemoryStore(conn, { logger, now: () => clock });
});

afterEach(() => {
  store.close();
});

// ==========================================================================
// Write path
// ==========================================================================

describe("ensureSession", () => {
  it("keeps the first registration's identity fields", () => {
    store.ensureSession("s1", "claude", "/home/dev/api", null);
    store.ensureSession("s1", "codex", "/somewhere/else", "o3");

    const session = store.getSession("s1");
    expect(session).toMatchObject({
      sessionId: "s1",
      source: "claude",
      workspacePath: "/home/dev/api",
      model: null,
      startedAt: "2026-03-01T12:00:00.000Z",
      turnCount: 0,
    });
  });

  it("applies schema twice without error", () => {
    expect(() => applySchema(conn.sqlite)).not.toThrow();
  });
});

describe("storeTurn", () => {
  beforeEach(() => {
    store.ensureSession("s1", "claude", "/home/dev/api");
  });

  it("counts distinct turn numbers regardless of overwrites", () => {
    for (const n of [1, 2, 1, 3, 2, 2]) {
      store.storeTurn(turn("s1", n));
    }

    expect(store.getSession("s1")?.turnCount).toBe(3);
    expect(turnRowCount("s1")).toBe(3);
  });

  it("replaces the row in place on a duplicate key", () => {
    const firstId = store.storeTurn(turn("s1", 1, { title: "First summary" }));
    clock = new Date("2026-03-02T08:30:00.000Z");
    const secondId = store.storeTurn(
      turn("s1", 1, { title: "Second summary", tags: "auth, jwt" }),
    );

    expect(secondId).toBe(firstId);
    expect(turnRowCount("s1")).toBe(1);
    expect(store.getSession("s1")?.turnCount).toBe(1);
    expect(store.getSessionTurns("s1")).toEqual([
      {
        turnNumber: 1,
        title: "Second summary",
        description: "- did a thing",
        tags: "auth, jwt",
        userMessage: "prompt 1",
        timestamp: "2026-03-02T08:30:00.000Z",
      },
    ]);
  });

  it("re-indexes overwritten turns so old text stops matching", () => {
    store.storeTurn(turn("s1", 1, { title: "Configure webpack aliases" }));
    store.storeTurn(turn("s1", 1, { title: "Configure vite aliases" }));

    expect(store.search("webpack")).toEqual([]);
    expect(store.search("vite").map((r) => r.title)).toEqual(["Configure vite aliases"]);
    assertFtsConsistent();
  });

  it("removes index entries when turn rows are deleted", () => {
    store.storeTurn(turn("s1", 1, { title: "Tune postgres vacuum" }));
    conn.sqlite.prepare("DELETE FROM turns WHERE session_id = ?").run("s1");

    expect(store.search("postgres")).toEqual([]);
    assertFtsConsistent();
  });

  it("rejects turns for unknown sessions", () => {
    expect(() => store.storeTurn(turn("missing", 1))).toThrow(/FOREIGN KEY/);
  });
});

describe("updateSessionSummary", () => {
  it("sets title, summary and ended_at", () => {
    store.ensureSession("s1");
    clock = new Date("2026-03-01T15:00:00.000Z");
    store.updateSessionSummary("s1", "Auth hardening", "Fixed token expiry checks.");

    expect(store.getSession("s1")).toMatchObject({
      title: "Auth hardening",
      summary: "Fixed token expiry checks.",
      startedAt: "2026-03-01T12:00:00.000Z",
      endedAt: "2026-03-01T15:00:00.000Z",
    });
  });

  it("still accepts turns afterwards", () => {
    store.ensureSession("s1");
    store.updateSessionSummary("s1", "Done", "Wrapped up.");
    store.storeTurn(turn("s1", 1));

    expect(store.getSession("s1")?.turnCount).toBe(1);
  });
});

describe("setSessionTitle", () => {
  it("updates only the title", () => {
    store.ensureSession("s1", "claude", "/repo");
    store.setSessionTitle("s1", "Investigate flaky CI");

    expect(store.getSession("s1")).toMatchObject({
      title: "Investigate flaky CI",
      summary: null,
      endedAt: null,
      workspacePath: "/repo",
    });
  });

  it("keeps the first title when called again", () => {
    store.ensureSession("s1", "claude", "/repo");

    expect(store.setSessionTitle("s1", "Opening prompt title")).toBe(true);
    expect(store.setSessionTitle("s1", "Later prompt title")).toBe(false);
    expect(store.getSession("s1")?.title).toBe("Opening prompt title");
  });

  it("reports false for unknown sessions", () => {
    expect(store.setSessionTitle("missing", "Anything")).toBe(false);
  });
});

describe("appendTurn", () => {
  it("numbers turns after the highest stored number", () => {
    store.ensureSession("codex-t1", "codex");
    const body = {
      sessionId: "codex-t1",
      userMessage: "next prompt",
      agentOutput: "next output",
      title: "Next",
      description: "- did a thing",
      tags: "misc",
    };

    expect(store.appendTurn(body)).toBe(1);
    store.storeTurn(turn("codex-t1", 5));
    expect(store.appendTurn(body)).toBe(6);
    expect(store.getSession("codex-t1")?.turnCount).toBe(3);
  });
});

describe("nextTurnNumber", () => {
  it("starts at 1 and follows the highest stored number", () => {
    store.ensureSession("codex-t1", "codex");
    expect(store.nextTurnNumber("codex-t1")).toBe(1);

    store.storeTurn(turn("codex-t1", 1));
    store.storeTurn(turn("codex-t1", 3));
    expect(store.nextTurnNumber("codex-t1")).toBe(4);
  });
});

// ==========================================================================
// Browse
// ==========================================================================

describe("sessionDetail", () => {
  beforeEach(() => {
    store.ensureSession("abc12345-1111");
    store.ensureSession("abc12345-2222");
    store.ensureSession("def99999");
    store.ensureSession("def99999-extended");
    store.storeTurn(turn("def99999", 2, { title: "Second" }));
    store.storeTurn(turn("def99999", 1, { title: "First" }));
  });

  it("resolves an exact id even when it prefixes another id", () => {
    const detail = store.sessionDetail("def99999");
    expect(detail?.sessionId).toBe("def99999");
    expect(detail?.turns.map((t) => t.title)).toEqual(["First", "Second"]);
  });

  it("resolves a unique prefix", () => {
    expect(store.sessionDetail("abc12345-1")?.sessionId).toBe("abc12345-1111");
  });

  it("returns null for an ambiguous prefix", () => {
    expect(store.sessionDetail("abc12345")).toBeNull();
  });

  it("returns null when nothing matches", () => {
    expect(store.sessionDetail("zzz")).toBeNull();
    expect(store.sessionDetail("")).toBeNull();
  });

  it("treats LIKE wildcards literally", () => {
    expect(store.sessionDetail("abc%")).toBeNull();
    expect(store.sessionDetail("abc12345_1111")).toBeNull();
  });
});

describe("recentSessions", () => {
  beforeEach(() => {
    clock = new Date("2026-02-01T00:00:00.000Z");
    store.ensureSession("old", "claude", "/home/dev/api-server");
    clock = new Date("2026-02-10T00:00:00.000Z");
    store.ensureSession("mid", "codex", "/home/dev/notes-app");
    clock = new Date("2026-02-20T00:00:00.000Z");
    store.ensureSession("new", "claude", "/home/dev/api-gateway");
  });

  it("orders by start time, newest first", () => {
    expect(store.recentSessions().map((s) => s.sessionId)).toEqual(["new", "mid", "old"]);
  });

  it("filters by workspace substring and honours the limit", () => {
    expect(store.recentSessions({ workspace: "api" }).map((s) => s.sessionId)).toEqual([
      "new",
      "old",
    ]);
    expect(store.recentSessions({ limit: 1 }).map((s) => s.sessionId)).toEqual(["new"]);
  });
});

// ==========================================================================
// Search
// ==========================================================================

describe("search", () => {
  function seedCorpus(): void {
    clock = new Date("2026-02-25T10:00:00.000Z");
    store.ensureSession("sess-api-0001", "claude", "/home/dev/projects/api-server");
    store.storeTurn({
      sessionId: "sess-api-0001",
      turnNumber: 1,
      userMessage: "the authentication middleware lets expired tokens through",
      agentOutput: "Patched the expiry comparison.",
      title: "Fix auth middleware expiry check",
      description: "- Patched src/middleware/auth.ts to reject expired tokens",
      tags: "auth, middleware, debug, express",
      modelName: "haiku",
    });
    store.storeTurn({
      sessionId: "sess-api-0001",
      turnNumber: 2,
      userMessage: "add rate limiting to the login endpoint",
      agentOutput: "Added a sliding window limiter.",
      title: "Add rate limiting to login endpoint",
      description: "- New src/middleware/rate-limit.ts using a sliding window",
      tags: "rate-limiter, express, implement",
      modelName: "haiku",
    });

    clock = new Date("2026-02-27T10:00:00.000Z");
    store.ensureSession("sess-notes-0002", "codex", "/home/dev/projects/notes-app");
    store.storeTurn({
      sessionId: "sess-notes-0002",
      turnNumber: 1,
      userMessage: "set up full text search for notes",
      agentOutput: "Created the virtual table and triggers.",
      title: "Set up FTS5 index on notes table",
      description: "- Added notes_fts virtual table with sync triggers",
      tags: "sqlite, fts5-index, implement",
      modelName: "o4-mini",
    });
    store.storeTurn({
      sessionId: "sess-notes-0002",
      turnNumber: 2,
      userMessage: "refresh tokens keep failing with invalid signature",
      agentOutput: "The refresh flow signed with the wrong key.",
      title: "Debug JWT refresh flow",
      description: "- Fixed key selection in src/auth/refresh.ts",
      tags: "jwt-refresh, auth, debug",
      modelName: "o4-mini",
    });
    clock = new Date("2026-03-01T12:00:00.000Z");
  }

  it("finds the authentication turn and logs each query", () => {
    seedCorpus();

    const hits = store.search("authentication");
    expect(hits).toHaveLength(1);
    expect(hits[0]).toMatchObject({
      sessionId: "sess-api-0001",
      turnNumber: 1,
      title: "Fix auth middleware expiry check",
      workspacePath: "/home/dev/projects/api-server",
      source: "claude",
      ageDays: 4.1,
    });
    expect(hits[0].score).toBeGreaterThan(0);

    expect(store.search("nonexistent-term-xyz")).toEqual([]);
    expect(lastSearchLog()).toEqual({
      query: "nonexistent-term-xyz",
      result_count: 0,
      workspace: null,
    });
  });

  it("requires every token to match", () => {
    seedCorpus();

    expect(store.search("auth debug").map((r) => r.title).sort()).toEqual([
      "Debug JWT refresh flow",
      "Fix auth middleware expiry check",
    ]);
    expect(store.search("auth sqlite")).toEqual([]);
  });

  it("never throws on empty or operator-only queries", () => {
    seedCorpus();

    for (const q of ["", "   ", "AND OR NOT", "* ^ - ( ) :", '"unbalanced', "title:auth", "NEAR("]) {
      expect(Array.isArray(store.search(q))).toBe(true);
    }
    expect(store.search("")).toEqual([]);
    expect(lastSearchLog()).toEqual({ query: "", result_count: 0, workspace: null });
  });

  it("records the workspace filter and result count", () => {
    seedCorpus();

    const hits = store.search("auth", { workspace: "notes-app" });
    expect(hits.map((r) => r.sessionId)).toEqual(["sess-notes-0002", "sess-api-0001"]);
    expect(lastSearchLog()).toEqual({ query: "auth", result_count: 2, workspace: "notes-app" });
  });

  it("truncates to the limit", () => {
    store.ensureSession("bulk");
    for (let n = 1; n <= 5; n++) {
      store.storeTurn(turn("bulk", n, { title: `Refactor parser step ${n}` }));
    }

    expect(store.search("parser", { limit: 2 })).toHaveLength(2);
  });

  it("returns nothing for a zero or negative limit and still logs the query", () => {
    store.ensureSession("bulk");
    for (let n = 1; n <= 5; n++) {
      store.storeTurn(turn("bulk", n, { title: `Refactor parser step ${n}` }));
    }

    expect(store.search("parser", { limit: 0 })).toEqual([]);
    expect(store.search("parser", { limit: -1 })).toEqual([]);
    expect(lastSearchLog()).toEqual({ query: "parser", result_count: 0, workspace: null });
  });

  describe("ranking", () => {
    const same = {
      userMessage: "migrate the billing worker queue",
      agentOutput: "done",
      title: "Migrate billing worker queue",
      description: "- Moved jobs to the new queue",
      tags: "billing, queue",
      modelName: "haiku",
    };

    beforeEach(() => {
      // Unrelated turns keep the shared term rare enough for a positive IDF.
      store.ensureSession("filler");
      for (let n = 1; n <= 4; n++) {
        store.storeTurn(turn("filler", n, { title: `Unrelated chore ${n}` }));
      }
    });

    it("ranks the more recent of two equal matches higher", () => {
      clock = new Date("2026-01-01T00:00:00.000Z");
      store.ensureSession("older", "claude", "/work/alpha");
      store.storeTurn({ sessionId: "older", turnNumber: 1, ...same });

      clock = new Date("2026-02-20T00:00:00.000Z");
      store.ensureSession("newer", "claude", "/work/alpha");
      store.storeTurn({ sessionId: "newer", turnNumber: 1, ...same });

      clock = new Date("2026-03-01T00:00:00.000Z");
      const hits = store.search("billing");

      expect(hits.map((r) => r.sessionId)).toEqual(["newer", "older"]);
      expect(hits[0].rank).toBe(hits[1].rank);
      expect(hits[0].score).toBeGreaterThan(hits[1].score);
    });

    it("doubles the score of turns in the filtered workspace", () => {
      clock = new Date("2026-02-20T00:00:00.000Z");
      store.ensureSession("in-alpha", "claude", "/work/alpha");
      store.ensureSession("in-beta", "claude", "/work/beta");
      store.storeTurn({ sessionId: "in-beta", turnNumber: 1, ...same });
      store.storeTurn({ sessionId: "in-alpha", turnNumber: 1, ...same });

      const hits = store.search("billing", { workspace: "alpha" });

      expect(hits.map((r) => r.sessionId)).toEqual(["in-alpha", "in-beta"]);
      expect(hits[0].score / hits[1].score).toBeCloseTo(2, 6);
    });
  });

  it("returns no results when the FTS index is unusable", () => {
    store.ensureSession("s1");
    store.storeTurn(turn("s1", 1, { title: "Anything" }));
    conn.sqlite.exec("DROP TABLE turns_fts");

    expect(store.search("anything")).toEqual([]);
  });

  it("does not fail when the search log cannot be written", () => {
    store.ensureSession("s1");
    store.storeTurn(turn("s1", 1, { title: "Cache warmup" }));
    conn.sqlite.exec("DROP TABLE search_log");

    expect(store.search("cache").map((r) => r.title)).toEqual(["Cache warmup"]);
  });
});

// ==========================================================================
// Stats
// ==========================================================================

describe("stats", () => {
  it("reports zeros on an empty store", () => {
    expect(store.stats()).toEqual({
      totalSessions: 0,
      sessionsBySource: {},
      totalTurns: 0,
      lastIndexed: null,
      totalSearches: 0,
      searchesWithHits: 0,
      avgResults: 0,
    });
  });

  it("aggregates sessions, turns and searches", () => {
    store.ensureSession("c1", "claude");
    store.ensureSession("c2", "claude");
    store.ensureSession("x1", "codex");
    store.storeTurn(turn("c1", 1, { title: "Profile slow query" }));
    clock = new Date("2026-03-01T13:00:00.000Z");
    store.storeTurn(turn("x1", 1, { title: "Bump dependencies" }));

    store.search("query");
    store.search("kubernetes");

    expect(store.stats()).toEqual({
      totalSessions: 3,
      sessionsBySource: { claude: 2, codex: 1 },
      totalTurns: 2,
      lastIndexed: "2026-03-01T13:00:00.000Z",
      totalSearches: 2,
      searchesWithHits: 1,
      avgResults: 0.5,
    });
  });
});

// ==========================================================================
// Lifecycle
// ==========================================================================

describe("withStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hindsight-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists across separate openings", async () => {
    const dbPath = join(dir, "nested", "db.sqlite");
    await withStore(dbPath, { logger }, (s) => {
      s.ensureSession("persisted", "claude", "/repo");
      s.storeTurn(turn("persisted", 1));
    });

    const count = await withStore(dbPath, { logger }, (s) => s.getSession("persisted")?.turnCount);
    expect(count).toBe(1);
  });

  it("closes the connection when the callback throws", async () => {
    let captured: MemoryStore | undefined;
    await expect(
      withStore(join(dir, "db.sqlite"), { logger }, (s) => {
        captured = s;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(() => captured?.getSession("x")).toThrow(/not open/);
  });

  it("gives appended turns distinct numbers across connections", () => {
    const dbPath = join(dir, "db.sqlite");
    const first = MemoryStore.open(dbPath, { logger });
    const second = MemoryStore.open(dbPath, { logger });
    try {
      first.ensureSession("codex-t", "codex", "/repo");
      const body = {
        sessionId: "codex-t",
        agentOutput: "",
        title: "Reply",
        description: "- replied",
        tags: "misc",
      };

      // Both writers observe the same next number before either stores.
      expect(first.nextTurnNumber("codex-t")).toBe(1);
      expect(second.nextTurnNumber("codex-t")).toBe(1);

      expect(first.appendTurn({ ...body, userMessage: "first reply" })).toBe(1);
      expect(second.appendTurn({ ...body, userMessage: "second reply" })).toBe(2);

      expect(
        first.getSessionTurns("codex-t").map((t) => [t.turnNumber, t.userMessage]),
      ).toEqual([
        [1, "first reply"],
        [2, "second reply"],
      ]);
      expect(second.getSession("codex-t")?.turnCount).toBe(2);
    } finally {
      first.close();
      second.close();
    }
  });
});
