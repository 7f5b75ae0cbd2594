/**
 * @module cli/commands
 * Maps parsed CLI options to one store operation and its rendered output.
 */

import type { MemoryStore } from "@hindsight/db";
import {
  formatRecentSessions,
  formatSearchResults,
  formatSessionDetail,
  formatStats,
} from "./formatter.js";

export const DEFAULT_SEARCH_LIMIT = 15;
export const DEFAULT_RECENT_LIMIT = 10;

export interface CliOptions {
  workspace?: string;
  limit?: number;
  /** `true` when `--recent` is given without a count. */
  recent?: number | true;
  session?: string;
  stats?: boolean;
}

/** Precedence: stats, session, recent, query, then recent sessions by default. */
export function executeCli(store: MemoryStore, queryWords: string[], options: CliOptions): string {
  if (options.stats) {
    return formatStats(store.stats());
  }
  if (options.session) {
    return formatSessionDetail(store.sessionDetail(options.session));
  }
  if (options.recent !== undefined) {
    const limit = options.recent === true ? DEFAULT_RECENT_LIMIT : options.recent;
    return formatRecentSessions(store.recentSessions({ workspace: options.workspace, limit }));
  }

  const query = queryWords.join(" ").trim();
  if (query) {
    return formatSearchResults(
      store.search(query, {
        workspace: options.workspace,
        limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
      }),
    );
  }
  return formatRecentSessions(
    store.recentSessions({ workspace: options.workspace, limit: DEFAULT_RECENT_LIMIT }),
  );
}
