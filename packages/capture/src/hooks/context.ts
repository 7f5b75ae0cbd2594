/**
 * @module capture/hooks/context
 * Dependencies shared by the hook handlers and the helpers they use.
 */

import type { Logger } from "pino";
import type { z } from "zod";
import type { HindsightConfig } from "@hindsight/shared";
import { withStore, type MemoryStore } from "@hindsight/db";
import type { Summarizer } from "../summarizer/summarizer.js";

/** The summarizer surface hooks depend on, so tests can pass a stand-in. */
export type HookSummarizer = Pick<Summarizer, "summarizeTurn" | "summarizeSession" | "generateTitle">;

export interface HookContext {
  config: HindsightConfig;
  logger: Logger;
  summarizer: HookSummarizer;
  /** Clock for stored timestamps. */
  now?: () => Date;
}

export type HookOutcome = "stored" | "skipped";

export type HookHandler = (payload: unknown, ctx: HookContext) => Promise<HookOutcome>;

/** Validate a hook payload; invalid payloads are logged and yield null. */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  logger: Logger,
  event: string,
): z.output<S> | null {
  const result = schema.safeParse(payload);
  if (!result.success) {
    logger.warn(
      { event, issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      "Invalid hook payload, ignoring",
    );
    return null;
  }
  return result.data;
}

/** Open the store for one short unit of work. Never held across a summarizer call. */
export function openStore<T>(ctx: HookContext, fn: (store: MemoryStore) => T): Promise<T> {
  return withStore(ctx.config.dbPath, { logger: ctx.logger, now: ctx.now }, fn);
}

/** Clip captured texts to the configured limits before they are stored. */
export function clipTurnText(
  config: HindsightConfig,
  userMessage: string,
  agentOutput: string,
): { userMessage: string; agentOutput: string } {
  return {
    userMessage: userMessage.slice(0, config.maxPromptChars),
    agentOutput: agentOutput.slice(0, config.maxResponseChars),
  };
}
