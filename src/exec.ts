/**
 * External command execution for privateerr-compose.
 *
 * Every invocation of docker-compose and docker goes through a CommandRunner,
 * which keeps the rest of the code limited to argument composition.
 */

import { constants } from "node:os";

import { execa, execaSync, ExecaError } from "execa";

import { DependencyError } from "./errors.js";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Narrow collaborator for running external commands.
 *
 * Implementations resolve to the command's exit status instead of rejecting
 * on failure, and throw DependencyError when the executable cannot be spawned.
 */
export interface CommandRunner {
  /** Run with inherited stdio (output streams to the terminal). */
  run(command: string, args: readonly string[]): Promise<number>;
  /** Run with captured stdout/stderr. */
  capture(command: string, args: readonly string[]): Promise<ExecResult>;
}

/**
 * Map an execa failure to an exit status.
 *
 * Signal terminations report 128 + signal number, like a shell does.
 */
function exitStatusOf(command: string, error: ExecaError): number {
  if ("code" in error && error.code === "ENOENT") {
    throw new DependencyError(command);
  }
  if (error.exitCode !== undefined) {
    return error.exitCode;
  }
  if (error.signal) {
    return 128 + constants.signals[error.signal];
  }
  return 1;
}

/** CommandRunner backed by execa. */
export class ExecaRunner implements CommandRunner {
  constructor(private readonly cwd: string = process.cwd()) {}

  async run(command: string, args: readonly string[]): Promise<number> {
    try {
      const result = await execa(command, args, { cwd: this.cwd, stdio: "inherit" });
      return result.exitCode ?? 0;
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        return exitStatusOf(command, error);
      }
      throw error;
    }
  }

  async capture(command: string, args: readonly string[]): Promise<ExecResult> {
    try {
      const result = await execa(command, args, { cwd: this.cwd, stdin: "ignore" });
      return { exitCode: result.exitCode ?? 0, stdout: result.stdout, stderr: result.stderr };
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        return {
          exitCode: exitStatusOf(command, error),
          stdout: typeof error.stdout === "string" ? error.stdout : "",
          stderr: typeof error.stderr === "string" ? error.stderr : "",
        };
      }
      throw error;
    }
  }
}

/**
 * Check whether a command resolves to an executable on PATH.
 */
export function commandExists(command: string): boolean {
  const result = execaSync("which", [command], { stdio: "ignore", reject: false });
  return result.exitCode === 0;
}
