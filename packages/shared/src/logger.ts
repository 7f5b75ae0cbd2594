/**
 * @module shared/logger
 * Pino logger factories. Hooks and the MCP server must keep stdout clean,
 * so they log to a file; the CLI logs pretty output to stderr.
 */

import pino, { type Logger } from "pino";
import type { HindsightConfig, LogLevel } from "./types.js";

/**
 * Logger writing JSON lines synchronously to the configured log file.
 * Synchronous writes keep short-lived hook processes from exiting with unflushed logs.
 *
 * @param config - Loaded configuration (uses logPath and logLevel)
 * @param name - Component name bound to every line (e.g. "hook", "mcp")
 */
export function createFileLogger(
  config: Pick<HindsightConfig, "logPath" | "logLevel">,
  name: string,
): Logger {
  return pino(
    { name, level: config.logLevel },
    pino.destination({ dest: config.logPath, mkdir: true, sync: true }),
  );
}

/** Human-readable logger on stderr for interactive commands. */
export function createConsoleLogger(level: LogLevel): Logger {
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    },
  });
}
