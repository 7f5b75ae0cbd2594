/**
 * @module db/store
 * The session/turn memory store: idempotent writes, scored full-text search,
 * browse queries and usage stats over one SQLite connection.
 */

import Database from "better-sqlite3";
import { and, asc, desc, eq, isNull, max, sql } from "drizzle-orm";
import type { Logger } from "pino";
import type {
  SearchResult,
  SessionDetail,
  SessionRecord,
  SessionSource,
  StoreStats,
  StoreTurnInput,
  TurnRecord,
} from "@hindsight/shared";
import { applySchema, createDb, type DbConnection, type HindsightDb } from "./client.js";
import { OVERFETCH_FACTOR, rankCandidates, sanitizeFtsQuery, type SearchCandidate } from "./ranking.js";
import { searchLog, sessions, turns } from "./schema.js";

export interface MemoryStoreOptions {
  logger: Logger;
  /** Clock used for every timestamp the store writes and for search recency. */
  now?: () => Date;
}

export interface SearchOptions {
  /** Substring of the session workspace path that earns the workspace bonus. */
  workspace?: string;
  limit?: number;
}

export interface RecentSessionsOptions {
  /** Only sessions whose workspace path contains this substring. */
  workspace?: string;
  limit?: number;
}

type StoreTransaction = Parameters<Parameters<HindsightDb["transaction"]>[0]>[0];

const SEARCH_SQL = `
  SELECT
    t.id AS id,
    t.session_id AS sessionId,
    t.turn_number AS turnNumber,
    t.title AS title,
    t.description AS description,
    t.tags AS tags,
    t.user_message AS userMessage,
    t.timestamp AS timestamp,
    s.workspace_path AS workspacePath,
    s.source AS source,
    bm25(turns_fts) AS rank
  FROM turns_fts
  JOIN turns t ON t.id = turns_fts.rowid
  JOIN sessions s ON s.session_id = t.session_id
  WHERE turns_fts MATCH ?
  ORDER BY rank
  LIMIT ?`;

const STATS_SQL = `
  SELECT
    (SELECT COUNT(*) FROM sessions) AS total_sessions,
    (SELECT COUNT(*) FROM turns) AS total_turns,
    (SELECT MAX(timestamp) FROM turns) AS last_indexed,
    (SELECT COUNT(*) FROM search_log) AS total_searches,
    (SELECT COUNT(*) FROM search_log WHERE result_count > 0) AS searches_with_hits,
    (SELECT COALESCE(AVG(result_count), 0) FROM search_log) AS avg_results`;

function toSessionRecord(row: typeof sessions.$inferSelect): SessionRecord {
  return {
    sessionId: row.sessionId,
    source: row.source,
    workspacePath: row.workspacePath,
    model: row.model,
    title: row.title,
    summary: row.summary,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    turnCount: row.turnCount,
  };
}

/**
 * Session/turn memory store backed by SQLite + FTS5.
 * Owns its connection: call {@link MemoryStore.close} (or use {@link withStore}) when done.
 */
export class MemoryStore {
  private db: HindsightDb;
  private sqlite: Database.Database;
  private logger: Logger;
  private now: () => Date;

  constructor(connection: DbConnection, options: MemoryStoreOptions) {
    this.db = connection.db;
    this.sqlite = connection.sqlite;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open (creating if needed) the database at `dbPath` and apply the schema.
   *
   * @param dbPath - SQLite file path, or ":memory:"
   */
  static open(dbPath: string, options: MemoryStoreOptions): MemoryStore {
    const connection = createDb(dbPath);
    try {
      applySchema(connection.sqlite);
    } catch (err) {
      connection.sqlite.close();
      throw err;
    }
    return new MemoryStore(connection, options);
  }

  close(): void {
    this.sqlite.close();
  }

  // ==========================================================================
  // Write path
  // ==========================================================================

  /**
   * Register a session if it is not known yet. The first call wins:
   * later calls never overwrite source, workspace or model.
   */
  ensureSession(
    sessionId: string,
    source: SessionSource = "claude",
    workspacePath: string | null = null,
    model: string | null = null,
  ): void {
    this.db
      .insert(sessions)
      .values({
        sessionId,
        source,
        workspacePath,
        model,
        startedAt: this.now().toISOString(),
      })
      .onConflictDoNothing()
      .run();
  }

  /**
   * Insert or overwrite the turn keyed by (sessionId, turnNumber).
   * The session's turn_count only grows when the key is new, so re-summarizing a turn
   * leaves it unchanged. The FTS index follows through the table triggers in the same transaction.
   *
   * @returns Row id of the stored turn (stable across overwrites)
   * @throws {SqliteError} If the session has not been registered (foreign key)
   */
  storeTurn(input: StoreTurnInput): number {
    return this.db.transaction((tx) => this.writeTurn(tx, input), {
      behavior: "immediate",
    });
  }

  /**
   * Store a turn under the session's next free number. The number is read and the
   * turn written under one write lock, so concurrent writers never share a number.
   *
   * @returns The turn number assigned
   */
  appendTurn(input: Omit<StoreTurnInput, "turnNumber">): number {
    return this.db.transaction(
      (tx) => {
        const row = tx
          .select({ maxTurn: max(turns.turnNumber) })
          .from(turns)
          .where(eq(turns.sessionId, input.sessionId))
          .get();
        const turnNumber = (row?.maxTurn ?? 0) + 1;
        this.writeTurn(tx, { ...input, turnNumber });
        return turnNumber;
      },
      { behavior: "immediate" },
    );
  }

  private writeTurn(tx: StoreTransaction, input: StoreTurnInput): number {
    const content = {
      userMessage: input.userMessage,
      agentOutput: input.agentOutput,
      title: input.title,
      description: input.description,
      tags: input.tags,
      modelName: input.modelName ?? null,
      timestamp: this.now().toISOString(),
    };

    const existing = tx
      .select({ id: turns.id })
      .from(turns)
      .where(
        and(
          eq(turns.sessionId, input.sessionId),
          eq(turns.turnNumber, input.turnNumber),
        ),
      )
      .get();

    const row = tx
      .insert(turns)
      .values({
        sessionId: input.sessionId,
        turnNumber: input.turnNumber,
        ...content,
      })
      .onConflictDoUpdate({
        target: [turns.sessionId, turns.turnNumber],
        set: content,
      })
      .returning({ id: turns.id })
      .get();

    if (!existing) {
      tx.update(sessions)
        .set({ turnCount: sql`${sessions.turnCount} + 1` })
        .where(eq(sessions.sessionId, input.sessionId))
        .run();
    }

    return row.id;
  }

  /**
   * Set the session's early title unless one is already recorded.
   *
   * @returns false when the session already had a title (or does not exist)
   */
  setSessionTitle(sessionId: string, title: string): boolean {
    const result = this.db
      .update(sessions)
      .set({ title })
      .where(and(eq(sessions.sessionId, sessionId), isNull(sessions.title)))
      .run();
    return result.changes > 0;
  }

  /** Record the end-of-session recap and mark the session as ended. */
  updateSessionSummary(sessionId: string, title: string, summary: string): void {
    this.db
      .update(sessions)
      .set({ title, summary, endedAt: this.now().toISOString() })
      .where(eq(sessions.sessionId, sessionId))
      .run();
  }

  /** Next free turn number for sources that do not report one (1 for a new session). */
  nextTurnNumber(sessionId: string): number {
    const row = this.db
      .select({ maxTurn: max(turns.turnNumber) })
      .from(turns)
      .where(eq(turns.sessionId, sessionId))
      .get();
    return (row?.maxTurn ?? 0) + 1;
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Full-text search ranked by bm25 × recency × workspace bonus.
   * Never throws on bad query text: FTS errors yield no results.
   * Every call is recorded in the search log.
   */
  search(query: string, options: SearchOptions = {}): SearchResult[] {
    const { workspace } = options;
    const limit = Math.max(0, Math.floor(options.limit ?? 20));
    const matchExpr = sanitizeFtsQuery(query);

    let candidates: SearchCandidate[] = [];
    if (limit > 0) {
      candidates = this.querySearchCandidates(matchExpr, limit);
    }

    const results = rankCandidates(candidates, {
      workspace,
      limit,
      now: this.now(),
    });

    this.logSearch(query, results.length, workspace);
    return results;
  }

  private querySearchCandidates(matchExpr: string, limit: number): SearchCandidate[] {
    try {
      return this.sqlite
        .prepare(SEARCH_SQL)
        .all(matchExpr, limit * OVERFETCH_FACTOR) as SearchCandidate[];
    } catch (err) {
      if (!(err instanceof Database.SqliteError)) throw err;
      this.logger.warn({ err, query: matchExpr }, "FTS query failed, returning no results");
      return [];
    }
  }

  private logSearch(query: string, resultCount: number, workspace: string | undefined): void {
    try {
      this.db
        .insert(searchLog)
        .values({
          query,
          resultCount,
          workspace: workspace ?? null,
          searchedAt: this.now().toISOString(),
        })
        .run();
    } catch (err) {
      this.logger.warn({ err }, "Failed to record search in search_log");
    }
  }

  // ==========================================================================
  // Browse
  // ==========================================================================

  /** Most recently started sessions first. */
  recentSessions(options: RecentSessionsOptions = {}): SessionRecord[] {
    const { workspace, limit = 10 } = options;
    return this.db
      .select()
      .from(sessions)
      .where(
        workspace
          ? sql`instr(${sessions.workspacePath}, ${workspace}) > 0`
          : undefined,
      )
      .orderBy(desc(sessions.startedAt), desc(sql`rowid`))
      .limit(limit)
      .all()
      .map(toSessionRecord);
  }

  getSession(sessionId: string): SessionRecord | null {
    const row = this.db
      .select()
      .from(sessions)
      .where(eq(sessions.sessionId, sessionId))
      .get();
    return row ? toSessionRecord(row) : null;
  }

  /**
   * Resolve a full session id or a unique prefix of one.
   * An ambiguous prefix resolves to nothing rather than to a guess.
   */
  sessionDetail(idOrPrefix: string): SessionDetail | null {
    let session = this.getSession(idOrPrefix);

    if (!session) {
      if (!idOrPrefix) return null;
      const matches = this.db
        .select()
        .from(sessions)
        .where(sql`instr(${sessions.sessionId}, ${idOrPrefix}) = 1`)
        .limit(2)
        .all();
      if (matches.length !== 1) {
        if (matches.length > 1) {
          this.logger.debug({ prefix: idOrPrefix }, "Ambiguous session prefix");
        }
        return null;
      }
      session = toSessionRecord(matches[0]);
    }

    return { ...session, turns: this.getSessionTurns(session.sessionId) };
  }

  /** Turn digests of a session in turn order. */
  getSessionTurns(sessionId: string): TurnRecord[] {
    return this.db
      .select({
        turnNumber: turns.turnNumber,
        title: turns.title,
        description: turns.description,
        tags: turns.tags,
        userMessage: turns.userMessage,
        timestamp: turns.timestamp,
      })
      .from(turns)
      .where(eq(turns.sessionId, sessionId))
      .orderBy(asc(turns.turnNumber))
      .all();
  }

  /** Usage statistics computed from the current tables. */
  stats(): StoreStats {
    const row = this.sqlite.prepare(STATS_SQL).get() as {
      total_sessions: number;
      total_turns: number;
      last_indexed: string | null;
      total_searches: number;
      searches_with_hits: number;
      avg_results: number;
    };

    const bySource = this.sqlite
      .prepare("SELECT source, COUNT(*) AS count FROM sessions GROUP BY source ORDER BY source")
      .all() as Array<{ source: string; count: number }>;

    return {
      totalSessions: row.total_sessions,
      sessionsBySource: Object.fromEntries(bySource.map((r) => [r.source, r.count])),
      totalTurns: row.total_turns,
      lastIndexed: row.last_indexed,
      totalSearches: row.total_searches,
      searchesWithHits: row.searches_with_hits,
      avgResults: row.avg_results,
    };
  }
}

/**
 * Open the store, run `fn`, and close the connection on every exit path.
 *
 * @example
 * ```typescript
 * const hits = await withStore(config.dbPath, { logger }, (store) =>
 *   store.search("jwt refresh", { workspace: process.cwd() }),
 * );
 * ```
 */
export async function withStore<T>(
  dbPath: string,
  options: MemoryStoreOptions,
  fn: (store: MemoryStore) => T | Promise<T>,
): Promise<T> {
  const store = MemoryStore.open(dbPath, options);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
