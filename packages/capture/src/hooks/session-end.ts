/**
 * @module capture/hooks/session-end
 * Claude `SessionEnd` hook: write the session recap.
 */

import { z } from "zod";
import { openStore, parsePayload, type HookContext, type HookOutcome } from "./context.js";

const payloadSchema = z.object({
  session_id: z.string().min(1),
});

export async function handleSessionEnd(payload: unknown, ctx: HookContext): Promise<HookOutcome> {
  const input = parsePayload(payloadSchema, payload, ctx.logger, "session-end");
  if (!input) return "skipped";

  const turns = await openStore(ctx, (store) => store.getSessionTurns(input.session_id));
  if (turns.length === 0) {
    ctx.logger.info({ sessionId: input.session_id }, "No turns stored, skipping recap");
    return "skipped";
  }

  const recap = await ctx.summarizer.summarizeSession(turns);

  await openStore(ctx, (store) =>
    store.updateSessionSummary(input.session_id, recap.sessionTitle, recap.sessionSummary),
  );

  ctx.logger.info(
    { sessionId: input.session_id, title: recap.sessionTitle, turns: turns.length },
    "Stored session recap",
  );
  return "stored";
}
