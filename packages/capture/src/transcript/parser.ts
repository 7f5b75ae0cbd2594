/**
 * @module capture/transcript/parser
 * Turns a transcript file into prompt, response and edit text for summarization.
 * Nothing here throws: unreadable input yields empty results.
 */

import fs from "node:fs";
import {
  flattenText,
  isGenuineUserTurn,
  parseTranscriptLine,
  type TranscriptEntry,
} from "./entries.js";

/** Read-only tools whose calls carry bulk data and add nothing to a summary. */
export const SKIP_TOOLS: ReadonlySet<string> = new Set([
  "Read",
  "Grep",
  "Glob",
  "WebFetch",
  "WebSearch",
]);

/** File-mutating tools, recorded as `[Tool: path]`. */
export const EDIT_TOOLS: ReadonlySet<string> = new Set(["Write", "Edit", "MultiEdit"]);

/** The whole conversation, flattened. */
export interface TranscriptDigest {
  prompts: string;
  responses: string;
  edits: string;
  turnCount: number;
}

/** The last user prompt and everything the agent produced after it. */
export interface LatestTurn {
  prompt: string;
  response: string;
  edits: string;
  /** Count of genuine user turns up to and including this one; 0 when none. */
  turnNumber: number;
}

const EMPTY_DIGEST: TranscriptDigest = { prompts: "", responses: "", edits: "", turnCount: 0 };
const EMPTY_TURN: LatestTurn = { prompt: "", response: "", edits: "", turnNumber: 0 };

/** Parse every valid line of a transcript file; [] when it cannot be read. */
export function readTranscriptEntries(transcriptPath: string): TranscriptEntry[] {
  let raw: string;
  try {
    raw = fs.readFileSync(transcriptPath, "utf-8");
  } catch {
    return [];
  }
  return raw.split("\n").flatMap((line) => {
    const entry = parseTranscriptLine(line);
    return entry ? [entry] : [];
  });
}

/** Append an assistant entry's text and edit markers to the given buffers. */
function collectAgentOutput(
  entry: TranscriptEntry,
  responses: string[],
  edits: string[],
): void {
  if (entry.role !== "assistant") return;

  if (entry.content.kind === "text") {
    if (entry.content.text) responses.push(entry.content.text);
    return;
  }

  for (const block of entry.content.blocks) {
    if (block.type === "text") {
      responses.push(block.text);
    } else if (block.type === "tool_use") {
      if (SKIP_TOOLS.has(block.name)) continue;
      const filePath = block.input.file_path;
      if (EDIT_TOOLS.has(block.name) && typeof filePath === "string" && filePath) {
        edits.push(`[${block.name}: ${filePath}]`);
      }
    }
  }
}

export function digestEntries(entries: TranscriptEntry[]): TranscriptDigest {
  const prompts: string[] = [];
  const responses: string[] = [];
  const edits: string[] = [];
  let turnCount = 0;

  for (const entry of entries) {
    if (isGenuineUserTurn(entry)) {
      prompts.push(flattenText(entry.content));
      turnCount++;
    } else {
      collectAgentOutput(entry, responses, edits);
    }
  }

  return {
    prompts: prompts.join("\n\n"),
    responses: responses.join("\n\n"),
    edits: edits.join("\n"),
    turnCount,
  };
}

export function latestTurnFromEntries(entries: TranscriptEntry[]): LatestTurn {
  let lastUserIdx = -1;
  let userTurns = 0;
  entries.forEach((entry, i) => {
    if (isGenuineUserTurn(entry)) {
      lastUserIdx = i;
      userTurns++;
    }
  });
  if (lastUserIdx < 0) return { ...EMPTY_TURN };

  const responses: string[] = [];
  const edits: string[] = [];
  for (const entry of entries.slice(lastUserIdx + 1)) {
    collectAgentOutput(entry, responses, edits);
  }

  return {
    prompt: flattenText(entries[lastUserIdx].content),
    response: responses.join("\n\n"),
    edits: edits.join("\n"),
    turnNumber: userTurns,
  };
}

/** Flatten a whole transcript file. */
export function parseTranscript(transcriptPath: string): TranscriptDigest {
  const entries = readTranscriptEntries(transcriptPath);
  return entries.length ? digestEntries(entries) : { ...EMPTY_DIGEST };
}

/** Extract the most recent turn of a transcript file. */
export function extractLatestTurn(transcriptPath: string): LatestTurn {
  return latestTurnFromEntries(readTranscriptEntries(transcriptPath));
}
