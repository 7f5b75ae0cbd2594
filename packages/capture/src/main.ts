#!/usr/bin/env node
/**
 * @module capture/main
 * `hindsight-hook <event> [payload]`: entry point wired into the assistants' hook settings.
 * Stdout stays empty; everything is logged to the configured log file.
 */

import { Argument, Command } from "commander";
import { createFileLogger, loadConfig } from "@hindsight/shared";
import { HOOK_EVENTS, runHook, type HookEvent } from "./hooks/index.js";
import { Summarizer } from "./summarizer/summarizer.js";

interface HookCliOptions {
  config?: string;
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  process.stdin.setEncoding("utf-8");
  let data = "";
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

const program = new Command()
  .name("hindsight-hook")
  .description("Capture coding-assistant turns into the Hindsight memory store")
  .addArgument(new Argument("<event>", "hook event").choices(HOOK_EVENTS))
  .argument("[payload]", "JSON payload; read from stdin when omitted")
  .option("-c, --config <path>", "config file (default: $HINDSIGHT_CONFIG or ~/.hindsight/config.yaml)")
  .action(async (event: HookEvent, payloadArg: string | undefined, options: HookCliOptions) => {
    const config = loadConfig(options.config);
    if (!config.enabled) return;

    const logger = createFileLogger(config, "hook");
    const rawPayload = payloadArg ?? (await readStdin());

    try {
      await runHook(event, rawPayload, {
        config,
        logger,
        summarizer: new Summarizer(config, logger),
      });
    } catch (err) {
      logger.fatal({ err, event }, "Hook failed");
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error("[hindsight-hook] Fatal:", err);
  process.exit(1);
});
