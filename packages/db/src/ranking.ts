/**
 * @module db/ranking
 * Search ranking: FTS5 query sanitization and the lexical × recency × workspace re-rank.
 */

import { ageInDays, type SearchResult } from "@hindsight/shared";

/** Time constant of the recency decay, in days (half-life ≈ 21 days). */
export const RECENCY_TIME_CONSTANT_DAYS = 30;

/** Multiplier for turns whose session workspace contains the filter. */
export const WORKSPACE_BONUS = 2.0;

/** Candidate rows fetched per requested result, leaving room for the re-rank. */
export const OVERFETCH_FACTOR = 3;

/** A lexical match joined with its session metadata, before re-ranking. */
export interface SearchCandidate {
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
  rank: number;
}

export interface RankOptions {
  workspace?: string;
  limit: number;
  now: Date;
}

/**
 * Turn raw user input into an FTS5 MATCH expression.
 * Every whitespace-delimited token becomes a quoted phrase (embedded quotes doubled),
 * so operators, column filters and wildcards are matched literally. Phrases are
 * joined with spaces, which FTS5 treats as AND.
 *
 * @returns The MATCH expression; `""` (an empty phrase) for blank input
 */
export function sanitizeFtsQuery(query: string): string {
  const tokens = query.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return '""';
  return tokens.map((t) => `"${t.replace(/"/g, '""')}"`).join(" ");
}

/** Exponential decay: 1 for a brand-new turn, e^-1 after 30 days. */
export function recencyFactor(ageDays: number): number {
  return Math.exp(-ageDays / RECENCY_TIME_CONSTANT_DAYS);
}

/** {@link WORKSPACE_BONUS} when a filter is given and the path contains it, else 1. */
export function workspaceFactor(
  workspacePath: string | null,
  filter: string | undefined,
): number {
  if (!filter || !workspacePath) return 1.0;
  return workspacePath.includes(filter) ? WORKSPACE_BONUS : 1.0;
}

/**
 * Score candidates and return the best `limit` of them.
 * score = -bm25 × recency × workspace bonus
 */
export function rankCandidates(
  candidates: SearchCandidate[],
  options: RankOptions,
): SearchResult[] {
  const scored = candidates.map((c): SearchResult => {
    const age = ageInDays(c.timestamp, options.now);
    const score = -c.rank * recencyFactor(age) * workspaceFactor(c.workspacePath, options.workspace);
    return { ...c, score, ageDays: Math.round(age * 10) / 10 };
  });

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, options.limit);
}
