/**
 * @module capture/hooks/codex-turn
 * Codex `notify` hook. The payload carries the turn's messages directly,
 * and turns are numbered by arrival since there is no transcript to count.
 */

import { z } from "zod";
import { flattenText, isRecord, toMessageContent } from "../transcript/entries.js";
import { clipTurnText, openStore, parsePayload, type HookContext, type HookOutcome } from "./context.js";

export const CODEX_TURN_EVENT = "agent-turn-complete";

const payloadSchema = z.object({
  type: z.string(),
  "thread-id": z.string().optional(),
  cwd: z.string().optional(),
  "input-messages": z.array(z.unknown()).default([]),
  "last-assistant-message": z.unknown().optional(),
});

/** Session id under which a Codex thread is stored. */
export function codexSessionId(threadId: string): string {
  return `codex-${threadId}`;
}

/** Text of the last user message. Bare strings are user messages. */
export function lastUserMessage(messages: unknown[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (typeof msg === "string") return msg;
    if (isRecord(msg) && msg.role === "user") {
      return flattenText(toMessageContent(msg.content));
    }
  }
  return "";
}

/** Assistant reply given as a string or as a `{ content }` message. */
export function assistantReply(message: unknown): string {
  if (typeof message === "string") return message;
  if (isRecord(message)) return flattenText(toMessageContent(message.content));
  return "";
}

export async function handleCodexTurn(payload: unknown, ctx: HookContext): Promise<HookOutcome> {
  const input = parsePayload(payloadSchema, payload, ctx.logger, "codex-turn");
  if (!input) return "skipped";
  if (input.type !== CODEX_TURN_EVENT) {
    ctx.logger.debug({ type: input.type }, "Ignoring Codex notification");
    return "skipped";
  }

  const threadId = input["thread-id"];
  if (!threadId) {
    ctx.logger.warn("Codex notification without thread-id, skipping");
    return "skipped";
  }

  const userMessage = lastUserMessage(input["input-messages"]);
  const reply = assistantReply(input["last-assistant-message"]);
  if (!userMessage && !reply) return "skipped";

  const summary = await ctx.summarizer.summarizeTurn(userMessage, reply, "");
  const sessionId = codexSessionId(threadId);

  const turnNumber = await openStore(ctx, (store) => {
    store.ensureSession(sessionId, "codex", input.cwd || null);
    return store.appendTurn({
      sessionId,
      ...clipTurnText(ctx.config, userMessage, reply),
      title: summary.title,
      description: summary.description,
      tags: summary.tags.join(", "),
      modelName: ctx.config.model,
    });
  });

  ctx.logger.info({ sessionId, turnNumber, title: summary.title }, "Stored Codex turn");
  return "stored";
}
