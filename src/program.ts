/**
 * Commander program for privateerr-compose.
 *
 * Builds the CLI from the operation table. Collaborators are injectable so
 * the whole command line can be exercised without docker.
 */

import { resolve } from "node:path";

import { Command } from "commander";

import { CANONICAL_OPERATIONS, OPERATION_ALIASES, OPERATION_DESCRIPTIONS, dispatch } from "./commands/index.js";
import { resolveComposeConfig, type Environment } from "./config.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { ComposeCtlError } from "./errors.js";
import { ExecaRunner, commandExists, type CommandRunner } from "./exec.js";
import { LogLevel, enableQuietMode, log, setLogLevel } from "./logger.js";

type GlobalOptions = {
  quiet?: boolean;
  verbose?: boolean;
  chdir?: string;
};

export interface ProgramDeps {
  env?: Environment;
  /** Creates the runner for external commands, rooted at the working directory. */
  createRunner?: (cwd: string) => CommandRunner;
  commandExists?: (command: string) => boolean;
  /** Receives the final exit status (defaults to setting process.exitCode). */
  onExit?: (code: number) => void;
}

/**
 * Global flags, declared on the root and on every operation so they are
 * accepted on either side of the operation name.
 */
function withGlobalOptions(command: Command): Command {
  return command
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .option("-v, --verbose", "Show debug output")
    .option("-C, --chdir <dir>", "Run as if started in <dir> (like git -C)");
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const createRunner = deps.createRunner ?? ((cwd: string) => new ExecaRunner(cwd));
  const exists = deps.commandExists ?? commandExists;
  const onExit =
    deps.onExit ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  async function execute(name: string, command: Command): Promise<void> {
    const opts = command.optsWithGlobals<GlobalOptions>();
    let exitCode: number;
    try {
      const cwd = opts.chdir ? resolve(opts.chdir) : process.cwd();
      const config = resolveComposeConfig(env, cwd);
      exitCode = await dispatch(name, {
        config,
        env,
        runner: createRunner(cwd),
        commandExists: exists,
      });
    } catch (error: unknown) {
      if (!(error instanceof ComposeCtlError)) {
        throw error;
      }
      log.error(error.message);
      exitCode = error.exitCode;
    }
    onExit(exitCode);
  }

  program
    .name(CLI_NAME)
    .description("Build, start, stop and inspect the privateerr docker-compose stack")
    .version(VERSION)
    .helpCommand(false)
    .hook("preAction", (_thisCommand, actionCommand) => {
      const opts = actionCommand.optsWithGlobals<GlobalOptions>();
      if (opts.quiet) {
        enableQuietMode();
      } else if (opts.verbose) {
        setLogLevel(LogLevel.DEBUG);
      }
    })
    .action(async (_options, command: Command) => {
      // Operands reaching the root are not operations commander knows about
      const [name = "default"] = command.args;
      await execute(name, command);
    });
  withGlobalOptions(program);

  const descriptions = new Map<string, string>(OPERATION_DESCRIPTIONS);

  for (const operation of CANONICAL_OPERATIONS) {
    const aliases = Object.entries(OPERATION_ALIASES)
      .filter(([, target]) => target === operation)
      .map(([alias]) => alias);

    const command = program
      .command(operation)
      .description(descriptions.get(operation) ?? operation)
      .aliases(aliases)
      .action(async (_options, cmd: Command) => {
        await execute(operation, cmd);
      });
    withGlobalOptions(command);
  }

  return program;
}
