/**
 * @module cli/formatter
 * Markdown-flavoured plain text rendering of search results, sessions and stats.
 */

import {
  formatAge,
  type SearchResult,
  type SessionDetail,
  type SessionRecord,
  type StoreStats,
} from "@hindsight/shared";

/** Shortest session id prefix shown. */
const MIN_ID_PREFIX = 8;
/** Characters of an ISO timestamp shown (date, hours and minutes). */
const TIMESTAMP_CHARS = 16;

/**
 * Shortest prefix length, at least `floor`, at which all `ids` stay distinct.
 * Returns the longest id's length when no shorter prefix separates them.
 */
export function uniquePrefix(ids: string[], floor = MIN_ID_PREFIX): number {
  if (ids.length <= 1) return floor;
  const maxLen = Math.max(...ids.map((id) => id.length));
  for (let length = floor; length < maxLen; length++) {
    if (new Set(ids.map((id) => id.slice(0, length))).size === ids.length) {
      return length;
    }
  }
  return maxLen;
}

/** Last path segment of a workspace path ("" when absent). */
export function workspaceName(workspacePath: string | null): string {
  if (!workspacePath) return "";
  const trimmed = workspacePath.replace(/\/+$/, "");
  return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) return "No results found.";

  const prefixLen = uniquePrefix(results.map((r) => r.sessionId));
  const lines: string[] = [];

  for (const r of results) {
    const workspace = workspaceName(r.workspacePath);
    const meta = [formatAge(r.ageDays), ...(workspace ? [workspace] : []), r.source];
    lines.push(`## ${r.title || "Untitled"} (${meta.join(", ")})`);
    if (r.tags) lines.push(`Tags: ${r.tags}`);
    if (r.description) lines.push(r.description);
    lines.push(`Session: ${r.sessionId.slice(0, prefixLen)}`);
    lines.push("");
  }

  return lines.join("\n");
}

export function formatRecentSessions(sessions: SessionRecord[]): string {
  if (sessions.length === 0) return "No sessions found.";

  const prefixLen = uniquePrefix(sessions.map((s) => s.sessionId));
  const lines: string[] = [];

  for (const s of sessions) {
    const started = s.startedAt.slice(0, TIMESTAMP_CHARS);
    const workspace = workspaceName(s.workspacePath);
    let header = `- **${s.title || "Untitled session"}** (${started}, ${s.turnCount} turns, ${s.source})`;
    if (workspace) header += ` [${workspace}]`;
    header += ` \`${s.sessionId.slice(0, prefixLen)}\``;
    lines.push(header);
    if (s.summary) lines.push(`  ${s.summary}`);
  }

  return lines.join("\n");
}

export function formatSessionDetail(detail: SessionDetail | null): string {
  if (!detail) return "Session not found.";

  const lines = [
    `# ${detail.title || "Untitled session"}`,
    `Source: ${detail.source}`,
    `Workspace: ${detail.workspacePath ?? "unknown"}`,
    `Started: ${detail.startedAt}`,
  ];
  if (detail.summary) lines.push("", detail.summary);
  lines.push("", `## Turns (${detail.turnCount})`);

  for (const t of detail.turns) {
    lines.push("", `### ${t.title || "Untitled"} (${t.timestamp.slice(0, TIMESTAMP_CHARS)})`);
    if (t.tags) lines.push(`Tags: ${t.tags}`);
    if (t.description) lines.push(t.description);
  }

  return lines.join("\n");
}

export function formatStats(stats: StoreStats): string {
  const bySource = Object.entries(stats.sessionsBySource)
    .map(([source, count]) => `${count} ${source}`)
    .join(", ");
  const hitRate =
    stats.totalSearches > 0
      ? `${Math.round((stats.searchesWithHits / stats.totalSearches) * 100)}%`
      : "n/a";

  return [
    "# Hindsight Stats",
    "",
    `Sessions: ${stats.totalSessions}${bySource ? ` (${bySource})` : ""}`,
    `Turns indexed: ${stats.totalTurns}`,
    `Last indexed: ${stats.lastIndexed ?? "never"}`,
    "",
    `Searches: ${stats.totalSearches}`,
    `Hit rate: ${hitRate} (${stats.searchesWithHits}/${stats.totalSearches} returned results)`,
    `Avg results per search: ${stats.avgResults.toFixed(1)}`,
  ].join("\n");
}
