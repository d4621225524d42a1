/**
 * Runs an external command and captures its stdout.
 *
 * stdin is closed and stderr discarded: the tools soundport runs are
 * non-interactive and report failure through their exit code.
 */

import { spawn } from "node:child_process";

/** Exit code and captured stdout of a finished command. */
export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal. */
  readonly code: number | null;
  readonly stdout: string;
}

/** Spawns `command` and resolves once it has exited. Rejects if it cannot start. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "ignore"] });

    let stdout = "";
    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ code, stdout });
    });
  });
