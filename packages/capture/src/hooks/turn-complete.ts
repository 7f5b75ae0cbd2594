/**
 * @module capture/hooks/turn-complete
 * Claude `Stop` hook: summarize and store the latest turn of the transcript.
 */

import { z } from "zod";
import { extractLatestTurn } from "../transcript/parser.js";
import { clipTurnText, openStore, parsePayload, type HookContext, type HookOutcome } from "./context.js";

const payloadSchema = z.object({
  session_id: z.string().min(1),
  transcript_path: z.string().min(1),
  cwd: z.string().optional(),
  stop_hook_active: z.boolean().optional(),
});

export async function handleTurnComplete(payload: unknown, ctx: HookContext): Promise<HookOutcome> {
  const input = parsePayload(payloadSchema, payload, ctx.logger, "turn-complete");
  if (!input) return "skipped";

  // A stop triggered by a hook would loop back into this hook.
  if (input.stop_hook_active) return "skipped";

  const turn = extractLatestTurn(input.transcript_path);
  if (!turn.prompt) {
    ctx.logger.info({ sessionId: input.session_id }, "No user prompt in latest turn, skipping");
    return "skipped";
  }

  const summary = await ctx.summarizer.summarizeTurn(turn.prompt, turn.response, turn.edits);

  await openStore(ctx, (store) => {
    store.ensureSession(input.session_id, "claude", input.cwd || null);
    store.storeTurn({
      sessionId: input.session_id,
      turnNumber: turn.turnNumber,
      ...clipTurnText(ctx.config, turn.prompt, turn.response),
      title: summary.title,
      description: summary.description,
      tags: summary.tags.join(", "),
      modelName: ctx.config.model,
    });
  });

  ctx.logger.info(
    { sessionId: input.session_id, turnNumber: turn.turnNumber, title: summary.title },
    "Stored turn",
  );
  return "stored";
}
