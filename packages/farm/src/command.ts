import { spawn } from "node:child_process";
import { debug } from "@renderplan/core";
import { FarmError, FarmErrorCode } from "./errors.js";

export interface CommandOptions {
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs an external command to completion; the seam tests replace. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

/**
 * Spawn a command without a shell and collect its output.
 * Resolves with the exit code; rejects only when the process cannot start
 * or runs past its timeout.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    debug.farm("command.start", { command, args: [...args] });

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? { ...process.env },
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill();
        }, options.timeoutMs)
      : null;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error) => {
      if (timer) clearTimeout(timer);
      reject(new FarmError(`Failed to start ${command}: ${error.message}`, FarmErrorCode.COMMAND_FAILED, command, error));
    });

    child.on("close", (exitCode) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        reject(new FarmError(
          `${command} did not finish within ${options.timeoutMs}ms`,
          FarmErrorCode.COMMAND_FAILED,
          command,
        ));
        return;
      }
      const result: CommandResult = {
        exitCode,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      };
      debug.farm("command.exit", { command, exitCode });
      resolve(result);
    });
  });
