#!/usr/bin/env node
/**
 * @module cli/main
 * `hindsight`: search and browse the session memory from a terminal.
 */

import { Command, InvalidArgumentError } from "commander";
import { withStore } from "@hindsight/db";
import { createConsoleLogger, loadConfig } from "@hindsight/shared";
import { DEFAULT_SEARCH_LIMIT, executeCli, type CliOptions } from "./commands.js";

interface MainOptions extends CliOptions {
  verbose?: boolean;
  config?: string;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const program = new Command()
  .name("hindsight")
  .description("Search your coding session history")
  .argument("[query...]", "search terms")
  .option("-w, --workspace <path>", "prefer (search) or filter (recent) by workspace path substring")
  .option("-l, --limit <n>", "max search results", positiveInt, DEFAULT_SEARCH_LIMIT)
  .option("-r, --recent [n]", "show the N most recent sessions (default 10)", positiveInt)
  .option("-s, --session <id>", "show one session by id or unique id prefix")
  .option("--stats", "show usage statistics")
  .option("-v, --verbose", "debug logging on stderr")
  .option("-c, --config <path>", "config file (default: $HINDSIGHT_CONFIG or ~/.hindsight/config.yaml)")
  .action(async (query: string[], options: MainOptions) => {
    const config = loadConfig(options.config);
    const logger = createConsoleLogger(options.verbose ? "debug" : "warn");
    const output = await withStore(config.dbPath, { logger }, (store) =>
      executeCli(store, query, options),
    );
    console.log(output);
  });

program.parseAsync().catch((err: unknown) => {
  console.error("[hindsight] Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
