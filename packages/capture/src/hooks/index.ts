/**
 * @module capture/hooks
 * Event dispatch for `hindsight-hook`.
 */

import { handleCodexTurn } from "./codex-turn.js";
import type { HookContext, HookHandler, HookOutcome } from "./context.js";
import { handlePromptSubmit } from "./prompt-submit.js";
import { handleSessionEnd } from "./session-end.js";
import { handleTurnComplete } from "./turn-complete.js";

export * from "./context.js";
export * from "./codex-turn.js";
export { handlePromptSubmit } from "./prompt-submit.js";
export { handleSessionEnd } from "./session-end.js";
export { handleTurnComplete } from "./turn-complete.js";

export const HOOK_EVENTS = ["turn-complete", "prompt-submit", "session-end", "codex-turn"] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

export const HOOK_HANDLERS: Record<HookEvent, HookHandler> = {
  "turn-complete": handleTurnComplete,
  "prompt-submit": handlePromptSubmit,
  "session-end": handleSessionEnd,
  "codex-turn": handleCodexTurn,
};

/**
 * Decode a raw JSON payload and run the handler for `event`.
 * Unparsable payloads are logged and skipped; store errors propagate.
 */
export async function runHook(
  event: HookEvent,
  rawPayload: string,
  ctx: HookContext,
): Promise<HookOutcome> {
  let payload: unknown;
  try {
    payload = JSON.parse(rawPayload);
  } catch (err) {
    ctx.logger.warn({ err, event }, "Hook payload is not valid JSON, ignoring");
    return "skipped";
  }
  const outcome = await HOOK_HANDLERS[event](payload, ctx);
  ctx.logger.debug({ event, outcome }, "Hook finished");
  return outcome;
}
