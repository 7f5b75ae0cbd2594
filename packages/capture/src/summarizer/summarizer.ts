/**
 * @module capture/summarizer/summarizer
 * Turn and session summarization through a local `claude` or `codex` CLI.
 * Every public method resolves: failures are logged and replaced by a
 * deterministic fallback so the caller's write path always completes.
 */

import type { Logger } from "pino";
import { z } from "zod";
import type {
  HindsightConfig,
  SessionRecap,
  TurnRecord,
  TurnSummary,
} from "@hindsight/shared";
import { isRecord } from "../transcript/entries.js";
import { runCommand, type CommandRunner } from "./command.js";
import {
  SESSION_RECAP_PROMPT,
  SESSION_TITLE_PROMPT,
  TURN_SUMMARY_PROMPT,
  sessionRecapInput,
  turnSummaryInput,
} from "./prompts.js";

/** Characters of the prompt kept in fallback titles. */
const FALLBACK_TITLE_CHARS = 60;
/** Characters of the opening prompt sent for an early session title. */
const TITLE_PROMPT_CHARS = 500;

const tagsSchema = z
  .union([z.array(z.string()), z.string()])
  .default([])
  .transform((tags) =>
    (typeof tags === "string" ? tags.split(",") : tags)
      .map((t) => t.trim())
      .filter(Boolean),
  );

const turnSummarySchema = z.object({
  title: z.string().trim().min(1),
  description: z
    .union([z.string(), z.array(z.string())])
    .default("")
    .transform((d) => (Array.isArray(d) ? d.join("\n") : d)),
  tags: tagsSchema,
});

const sessionRecapSchema = z
  .object({
    session_title: z.string().trim().min(1),
    session_summary: z.string(),
  })
  .transform((r): SessionRecap => ({
    sessionTitle: r.session_title,
    sessionSummary: r.session_summary,
  }));

const titleSchema = z.object({ title: z.string().trim().min(1) });

const FENCE_RE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/** Parse model text as JSON, tolerating a surrounding Markdown code fence. */
export function parseModelJson(text: string): unknown {
  const trimmed = text.trim();
  const fenced = FENCE_RE.exec(trimmed);
  return JSON.parse(fenced ? fenced[1] : trimmed);
}

/** `claude --output-format json` wraps the answer in `{ "result": "..." }`. */
export function extractClaudeAnswer(stdout: string): unknown {
  const envelope: unknown = JSON.parse(stdout);
  const inner = isRecord(envelope) && "result" in envelope ? envelope.result : envelope;
  return typeof inner === "string" ? parseModelJson(inner) : inner;
}

function textOf(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  let last = "";
  for (const block of content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
      last = block.text;
    }
  }
  return last;
}

/**
 * `codex exec --json` prints JSON Lines events; the answer is the text of the
 * last assistant message. Falls back to the whole stdout.
 */
export function extractCodexAnswer(stdout: string): unknown {
  let lastText = "";
  for (const line of stdout.trim().split("\n")) {
    let event: unknown;
    try {
      event = JSON.parse(line);
    } catch {
      continue;
    }
    if (!isRecord(event)) continue;

    if (event.type === "message" && event.role === "assistant") {
      lastText = textOf(event.content) || lastText;
    } else if (
      event.type === "item.completed" &&
      isRecord(event.item) &&
      event.item.type === "agent_message" &&
      typeof event.item.text === "string"
    ) {
      lastText = event.item.text;
    }
  }
  return parseModelJson(lastText || stdout);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export class Summarizer {
  private config: HindsightConfig;
  private logger: Logger;
  private run: CommandRunner;

  constructor(config: HindsightConfig, logger: Logger, run: CommandRunner = runCommand) {
    this.config = config;
    this.logger = logger;
    this.run = run;
  }

  /** Title, bullet description and tags for one turn. */
  async summarizeTurn(prompt: string, response: string, edits: string): Promise<TurnSummary> {
    const input = turnSummaryInput(
      prompt.slice(0, this.config.maxPromptChars),
      response.slice(0, this.config.maxResponseChars),
      edits.slice(0, this.config.maxEditChars),
    );
    try {
      return await this.ask(TURN_SUMMARY_PROMPT, input, turnSummarySchema);
    } catch (err) {
      this.logger.error({ err }, "Turn summarization failed, using fallback");
      return {
        title: prompt.slice(0, FALLBACK_TITLE_CHARS) || "Untitled turn",
        description: "- Summarization failed",
        tags: [],
      };
    }
  }

  /** Title and short recap for a finished session. */
  async summarizeSession(turns: TurnRecord[]): Promise<SessionRecap> {
    try {
      return await this.ask(SESSION_RECAP_PROMPT, sessionRecapInput(turns), sessionRecapSchema);
    } catch (err) {
      this.logger.error({ err, turns: turns.length }, "Session recap failed, using fallback");
      return {
        sessionTitle: turns[0]?.title || "Untitled session",
        sessionSummary: `Session with ${turns.length} turns.`,
      };
    }
  }

  /** Early session title from the opening prompt. */
  async generateTitle(openingPrompt: string): Promise<string> {
    try {
      const { title } = await this.ask(
        SESSION_TITLE_PROMPT,
        openingPrompt.slice(0, TITLE_PROMPT_CHARS),
        titleSchema,
      );
      return title;
    } catch (err) {
      this.logger.error({ err }, "Title generation failed, using fallback");
      return openingPrompt.slice(0, FALLBACK_TITLE_CHARS);
    }
  }

  /**
   * Run the configured CLI and validate its JSON answer.
   *
   * @throws {Error} On spawn failure, timeout, non-zero exit, unparsable output or schema mismatch
   */
  private async ask<S extends z.ZodTypeAny>(
    system: string,
    user: string,
    schema: S,
  ): Promise<z.output<S>> {
    const { provider, model, timeoutMs } = this.config;
    const [command, args]: [string, string[]] =
      provider === "codex"
        ? ["codex", ["exec", "--model", model, "--json", `${system}\n\n${user}`]]
        : [
            "claude",
            [
              "-p",
              "--model", model,
              "--tools", "",
              "--output-format", "json",
              "--no-session-persistence",
              "--system-prompt", system,
              user,
            ],
          ];

    const startTime = Date.now();
    const result = await this.run(command, args, { timeoutMs });
    this.logger.debug(
      { command, exitCode: result.exitCode, durationMs: Date.now() - startTime },
      "Summarizer CLI finished",
    );

    if (result.timedOut) {
      throw new Error(`${command} timed out after ${timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      throw new Error(
        `${command} exited with code ${result.exitCode}: ${result.stderr.trim().slice(0, 200)}`,
      );
    }

    const answer =
      provider === "codex" ? extractCodexAnswer(result.stdout) : extractClaudeAnswer(result.stdout);
    const parsed = schema.safeParse(answer);
    if (!parsed.success) {
      throw new Error(`Unexpected summarizer output: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}
