/**
 * @module capture/hooks/prompt-submit
 * Claude `UserPromptSubmit` hook: give a new session an early title.
 */

import { z } from "zod";
import { openStore, parsePayload, type HookContext, type HookOutcome } from "./context.js";

const payloadSchema = z.object({
  session_id: z.string().min(1),
  prompt: z.string(),
  cwd: z.string().optional(),
});

export async function handlePromptSubmit(payload: unknown, ctx: HookContext): Promise<HookOutcome> {
  const input = parsePayload(payloadSchema, payload, ctx.logger, "prompt-submit");
  if (!input || !input.prompt.trim()) return "skipped";

  const existing = await openStore(ctx, (store) => store.getSession(input.session_id));
  if (existing?.title) return "skipped";

  const title = await ctx.summarizer.generateTitle(input.prompt);

  const written = await openStore(ctx, (store) => {
    store.ensureSession(input.session_id, "claude", input.cwd || null);
    return store.setSessionTitle(input.session_id, title);
  });
  if (!written) {
    ctx.logger.debug({ sessionId: input.session_id }, "Session already titled, keeping it");
    return "skipped";
  }

  ctx.logger.info({ sessionId: input.session_id, title }, "Set early session title");
  return "stored";
}
