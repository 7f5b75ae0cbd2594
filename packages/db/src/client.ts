/**
 * @module db/client
 * Database initialization with WAL mode, a short busy timeout, and the
 * idempotent schema (tables, FTS5 index and the triggers that keep it in sync).
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import path from "node:path";
import fs from "node:fs";

/** Drizzle ORM database instance typed with the Hindsight schema. */
export type HindsightDb = BetterSQLite3Database<typeof schema>;

/** Drizzle handle plus the underlying better-sqlite3 connection it wraps. */
export interface DbConnection {
  db: HindsightDb;
  sqlite: Database.Database;
}

/** How long a writer waits for a competing hook process to release the lock. */
export const BUSY_TIMEOUT_MS = 5000;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  source TEXT NOT NULL DEFAULT 'claude',
  workspace_path TEXT,
  model TEXT,
  title TEXT,
  summary TEXT,
  started_at TEXT NOT NULL,
  ended_at TEXT,
  turn_count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS turns (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL REFERENCES sessions(session_id),
  turn_number INTEGER NOT NULL,
  user_message TEXT,
  agent_output TEXT,
  title TEXT,
  description TEXT,
  tags TEXT,
  model_name TEXT,
  timestamp TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS search_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  query TEXT NOT NULL,
  result_count INTEGER NOT NULL DEFAULT 0,
  workspace TEXT,
  searched_at TEXT NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_turns_session_turn ON turns(session_id, turn_number);
CREATE INDEX IF NOT EXISTS idx_turns_timestamp ON turns(timestamp);
CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at);
CREATE INDEX IF NOT EXISTS idx_sessions_workspace ON sessions(workspace_path);

CREATE VIRTUAL TABLE IF NOT EXISTS turns_fts USING fts5(
  title,
  description,
  tags,
  user_message,
  content='turns',
  content_rowid='id'
);

CREATE TRIGGER IF NOT EXISTS turns_ai AFTER INSERT ON turns BEGIN
  INSERT INTO turns_fts(rowid, title, description, tags, user_message)
  VALUES (new.id, new.title, new.description, new.tags, new.user_message);
END;

CREATE TRIGGER IF NOT EXISTS turns_ad AFTER DELETE ON turns BEGIN
  INSERT INTO turns_fts(turns_fts, rowid, title, description, tags, user_message)
  VALUES ('delete', old.id, old.title, old.description, old.tags, old.user_message);
END;

CREATE TRIGGER IF NOT EXISTS turns_au AFTER UPDATE ON turns BEGIN
  INSERT INTO turns_fts(turns_fts, rowid, title, description, tags, user_message)
  VALUES ('delete', old.id, old.title, old.description, old.tags, old.user_message);
  INSERT INTO turns_fts(rowid, title, description, tags, user_message)
  VALUES (new.id, new.title, new.description, new.tags, new.user_message);
END;
`;

/**
 * Create a SQLite database connection with WAL journal mode, foreign keys and a busy timeout.
 * Creates the parent directory if it does not exist. Pass ":memory:" for a throwaway database.
 *
 * @param dbPath - Path to the SQLite database file
 * @returns The Drizzle ORM instance and the underlying better-sqlite3 handle
 */
export function createDb(dbPath: string): DbConnection {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  const db = drizzle(sqlite, { schema });

  return { db, sqlite };
}

/**
 * Create any missing tables, indexes, the FTS5 index and its sync triggers.
 * Safe to run on every open.
 *
 * @param sqlite - Open better-sqlite3 connection
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}
