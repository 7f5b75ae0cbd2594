/**
 * @module shared/types
 * Core type definitions shared across all Hindsight packages.
 */

/** Tool that produced a session. The column itself is free text. */
export type SessionSource = "claude" | "codex";

/** Local CLI used to summarize turns and sessions. */
export type LlmProvider = "claude" | "codex";

/** Log levels accepted in config.yaml. */
export const LOG_LEVELS = [
  "fatal", "error", "warn", "info", "debug", "trace", "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Top-level application configuration loaded from ~/.hindsight/config.yaml. */
export interface HindsightConfig {
  provider: LlmProvider;
  /** Model passed to the summarizer CLI (e.g. "haiku", "o4-mini"). */
  model: string;
  dbPath: string;
  logPath: string;
  logLevel: LogLevel;
  /** When false, every hook exits without doing anything. */
  enabled: boolean;
  /** Wall-clock timeout for one summarizer call, in milliseconds. */
  timeoutMs: number;
  maxPromptChars: number;
  maxResponseChars: number;
  maxEditChars: number;
}

/** A session row as returned by browse operations. */
export interface SessionRecord {
  sessionId: string;
  source: string;
  workspacePath: string | null;
  model: string | null;
  title: string | null;
  summary: string | null;
  startedAt: string;
  endedAt: string | null;
  turnCount: number;
}

/** Digest of one stored turn, in session order. */
export interface TurnRecord {
  turnNumber: number;
  title: string | null;
  description: string | null;
  tags: string | null;
  userMessage: string | null;
  timestamp: string;
}

/** A session together with its ordered turns. */
export interface SessionDetail extends SessionRecord {
  turns: TurnRecord[];
}

/** Input for a single turn write. Texts are expected to be truncated by the caller. */
export interface StoreTurnInput {
  sessionId: string;
  turnNumber: number;
  userMessage: string;
  agentOutput: string;
  title: string;
  description: string;
  /** Comma-joined tag list. */
  tags: string;
  modelName?: string | null;
}

/** A ranked search hit. */
export interface SearchResult {
  id: number;
  sessionId: string;
  turnNumber: number;
  title: string | null;
  description: string | null;
  tags: string | null;
  userMessage: string | null;
  timestamp: string | null;
  workspacePath: string | null;
  source: string;
  /** Raw bm25() value from FTS5 (more negative is better). */
  rank: number;
  /** Combined lexical × recency × workspace score (higher is better). */
  score: number;
  ageDays: number;
}

/** Aggregate usage numbers computed from current store state. */
export interface StoreStats {
  totalSessions: number;
  sessionsBySource: Record<string, number>;
  totalTurns: number;
  lastIndexed: string | null;
  totalSearches: number;
  searchesWithHits: number;
  avgResults: number;
}

/** Summarizer output for a single turn. */
export interface TurnSummary {
  title: string;
  description: string;
  tags: string[];
}

/** Summarizer output for a finished session. */
export interface SessionRecap {
  sessionTitle: string;
  sessionSummary: string;
}
