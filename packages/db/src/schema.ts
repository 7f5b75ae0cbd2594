/**
 * @module db/schema
 * Drizzle ORM table definitions for the Hindsight SQLite database.
 * The FTS5 shadow index and its triggers live in the DDL in client.ts,
 * since Drizzle has no model for virtual tables.
 */

import {
  sqliteTable,
  integer,
  text,
  uniqueIndex,
  index,
} from "drizzle-orm/sqlite-core";

/** One coding-assistant conversation, keyed by the host tool's session id. */
export const sessions = sqliteTable(
  "sessions",
  {
    sessionId: text("session_id").primaryKey(),
    source: text("source").notNull().default("claude"),
    workspacePath: text("workspace_path"),
    model: text("model"),
    title: text("title"),
    summary: text("summary"),
    startedAt: text("started_at")
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
    endedAt: text("ended_at"),
    /** Number of distinct turn_number values stored for this session. */
    turnCount: integer("turn_count").notNull().default(0),
  },
  (table) => [
    index("idx_sessions_started").on(table.startedAt),
    index("idx_sessions_workspace").on(table.workspacePath),
  ],
);

/** A user prompt plus everything the agent produced until the next prompt. */
export const turns = sqliteTable(
  "turns",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: text("session_id")
      .notNull()
      .references(() => sessions.sessionId),
    turnNumber: integer("turn_number").notNull(),
    userMessage: text("user_message"),
    agentOutput: text("agent_output"),
    title: text("title"),
    description: text("description"),
    /** Comma-joined tag list. */
    tags: text("tags"),
    modelName: text("model_name"),
    timestamp: text("timestamp")
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
  },
  (table) => [
    uniqueIndex("idx_turns_session_turn").on(table.sessionId, table.turnNumber),
    index("idx_turns_timestamp").on(table.timestamp),
  ],
);

/** Append-only record of search calls, read only for usage stats. */
export const searchLog = sqliteTable("search_log", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  query: text("query").notNull(),
  resultCount: integer("result_count").notNull().default(0),
  workspace: text("workspace"),
  searchedAt: text("searched_at")
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});
