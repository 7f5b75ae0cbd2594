/**
 * @module capture/summarizer/prompts
 * System prompts for the summarizer CLI. Each asks for bare JSON.
 */

export const TURN_SUMMARY_PROMPT = `You index a single coding turn so it can be found again later.

Reply with JSON only, no prose and no markdown:
{"title": "...", "description": "...", "tags": ["..."]}

title: what the turn achieved, at most 80 characters, concrete.
  good: "Reject expired tokens in auth middleware"
  good: "Add FTS5 index over turn titles"
  bad:  "Update code", "Work on auth"

description: 2 to 5 "- " bullets naming files, functions, errors or decisions
that would tell a future reader whether this turn is relevant.

tags: 5 to 10 search terms covering
  domain (auth, billing, rendering, deployment)
  action (debug, implement, refactor, configure, test)
  stack  (react, node, postgres, redis, docker)
  detail (jwt-refresh, rate-limiter, fts5-index)
Leave out generic words such as code, fix, update, change, work, file.`;

export const SESSION_RECAP_PROMPT = `You recap a finished coding session for later recall.

Reply with JSON only, no prose and no markdown:
{"session_title": "...", "session_summary": "..."}

session_title: the overall goal, at most 80 characters.
session_summary: 2 to 4 sentences on outcomes, key decisions and anything left open.
Summarize the result; do not retell the turns one by one.`;

export const SESSION_TITLE_PROMPT = `Write a title of at most 60 characters describing what this coding session sets out to do.

Reply with JSON only: {"title": "..."}`;

/** User message for {@link TURN_SUMMARY_PROMPT}. Inputs arrive already truncated. */
export function turnSummaryInput(prompt: string, response: string, edits: string): string {
  return [
    "USER ASKED:",
    prompt,
    "",
    "AGENT OUTPUT:",
    response,
    "",
    "FILES CHANGED:",
    edits.trim() ? edits : "(none)",
  ].join("\n");
}

/** User message for {@link SESSION_RECAP_PROMPT}. */
export function sessionRecapInput(
  turns: ReadonlyArray<{ title: string | null; description: string | null }>,
): string {
  const body = turns
    .map((t, i) => `Turn ${i + 1}: ${t.title ?? "Untitled"}\n${t.description ?? ""}`)
    .join("\n\n");
  return `SESSION TURNS:\n\n${body}`;
}
