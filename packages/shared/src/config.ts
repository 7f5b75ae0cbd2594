/**
 * @module shared/config
 * YAML configuration loading with Zod validation.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { LOG_LEVELS, type HindsightConfig } from "./types.js";

/** Per-user data directory holding the database, log file and config. */
export const HINDSIGHT_DIR = path.join(os.homedir(), ".hindsight");

export const DEFAULT_CONFIG_PATH = path.join(HINDSIGHT_DIR, "config.yaml");

/** Expand a leading "~" to the current user's home directory. */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

// z.object strips keys it does not know, so stale or misspelled settings are dropped.
const configSchema = z.object({
  provider: z.enum(["claude", "codex"]).default("claude"),
  model: z.string().min(1).default("haiku"),
  dbPath: z.string().min(1).default(path.join(HINDSIGHT_DIR, "db.sqlite")).transform(expandHome),
  logPath: z.string().min(1).default(path.join(HINDSIGHT_DIR, "hindsight.log")).transform(expandHome),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  enabled: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30_000),
  maxPromptChars: z.number().int().positive().default(4000),
  maxResponseChars: z.number().int().positive().default(8000),
  maxEditChars: z.number().int().positive().default(2000),
});

/** Configuration with every field at its default value. */
export function defaultConfig(): HindsightConfig {
  return configSchema.parse({});
}

/**
 * Load and validate config.yaml.
 * A missing file, or a document that is not a mapping, yields the defaults.
 *
 * @param configPath - Path to the YAML config file
 * @returns Validated HindsightConfig object
 * @throws {Error} If a known key holds a value of the wrong type or range
 */
export function loadConfig(
  configPath: string = process.env.HINDSIGHT_CONFIG ?? DEFAULT_CONFIG_PATH,
): HindsightConfig {
  const resolved = path.resolve(expandHome(configPath));
  if (!fs.existsSync(resolved)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  const parsed: unknown = parseYaml(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return defaultConfig();
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config:\n${errors}`);
  }

  return result.data;
}
