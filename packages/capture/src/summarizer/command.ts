/**
 * @module capture/summarizer/command
 * Runs a local CLI to completion with a wall-clock timeout.
 */

import { spawn } from "node:child_process";

/** Grace period between SIGTERM and SIGKILL once the timeout fires. */
const KILL_GRACE_MS = 2000;
/** Cap on buffered stderr, keeping the tail. */
const MAX_STDERR_BUF = 10 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** null when the process was ended by a signal. */
  exitCode: number | null;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
}

/** Spawns `command` with `args`; injectable so tests never start a real process. */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions,
) => Promise<CommandResult>;

/**
 * Default {@link CommandRunner}. Rejects only when the process cannot be spawned.
 * CLAUDECODE is removed from the child environment so a nested CLI does not
 * detect the parent session.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  const { CLAUDECODE: _, ...env } = process.env;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
      if (stderr.length > MAX_STDERR_BUF) {
        stderr = stderr.slice(-MAX_STDERR_BUF);
      }
    });

    let forceKill: NodeJS.Timeout | undefined;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      forceKill = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
    }, options.timeoutMs);

    child.on("error", (err) => {
      clearTimeout(timer);
      clearTimeout(forceKill);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      clearTimeout(forceKill);
      resolve({ stdout, stderr, exitCode: code, timedOut });
    });
  });
};
