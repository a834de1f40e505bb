import { execFile } from "node:child_process";
import { CommandError } from "../errors.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;
const MAX_STDERR_IN_ERROR = 8192;

/**
 * Runs a binary directly (no shell) in a child process, so long-running
 * tools never block the event loop. Rejects with CommandError on a non-zero
 * exit, timeout or spawn failure.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
        windowsHide: true,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr });
          return;
        }
        const code = typeof err.code === "number" ? err.code : null;
        const detail = (stderr || err.message).slice(0, MAX_STDERR_IN_ERROR);
        reject(new CommandError(command, code, detail));
      }
    );
  });
