/**
 * @module capture/transcript/entries
 * Typed model of one coding-assistant transcript record (JSON Lines).
 * Records are validated structurally; anything unrecognized becomes an "other" variant.
 */

/** One block of a structured message body. */
export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; name: string; input: Record<string, unknown> }
  | { type: "other" };

/** A message body: a plain string or a list of blocks. */
export type MessageContent =
  | { kind: "text"; text: string }
  | { kind: "blocks"; blocks: ContentBlock[] };

export type EntryRole = "user" | "assistant" | "other";

export interface TranscriptEntry {
  role: EntryRole;
  content: MessageContent;
}

const EMPTY_CONTENT: MessageContent = { kind: "text", text: "" };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toBlock(raw: unknown): ContentBlock {
  if (!isRecord(raw)) return { type: "other" };
  if (raw.type === "text" && typeof raw.text === "string") {
    return { type: "text", text: raw.text };
  }
  if (raw.type === "tool_use") {
    return {
      type: "tool_use",
      name: typeof raw.name === "string" ? raw.name : "",
      input: isRecord(raw.input) ? raw.input : {},
    };
  }
  return { type: "other" };
}

/** Normalize a raw `content` field (string, block list, or anything else). */
export function toMessageContent(raw: unknown): MessageContent {
  if (typeof raw === "string") return { kind: "text", text: raw };
  if (Array.isArray(raw)) return { kind: "blocks", blocks: raw.map(toBlock) };
  return EMPTY_CONTENT;
}

function toRole(type: unknown): EntryRole {
  return type === "user" || type === "assistant" ? type : "other";
}

/**
 * Parse one transcript line of the form `{ type, message: { content } }`.
 *
 * @returns The entry, or null for blank, malformed, or non-object lines
 */
export function parseTranscriptLine(line: string): TranscriptEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const message = isRecord(parsed.message) ? parsed.message : {};
  return {
    role: toRole(parsed.type),
    content: toMessageContent(message.content),
  };
}

/** Text of a message: plain text as-is, or all text blocks joined by single spaces. */
export function flattenText(content: MessageContent): string {
  if (content.kind === "text") return content.text;
  return content.blocks
    .flatMap((b) => (b.type === "text" ? [b.text] : []))
    .join(" ");
}

/**
 * A user entry that carries real text. Tool results are also recorded with the
 * user role but hold no text blocks, so they do not count.
 */
export function isGenuineUserTurn(entry: TranscriptEntry): boolean {
  return entry.role === "user" && flattenText(entry.content).trim() !== "";
}
