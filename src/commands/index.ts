/**
 * Operation dispatch for privateerr-compose.
 *
 * Maps operation names to handlers. Aliases resolve to their target before
 * anything runs, and preconditions are evaluated in table order before the
 * handler, so a failing check never reaches the orchestration tool.
 */

import { CLI_NAME } from "../constants.js";
import { ValidationError } from "../errors.js";
import { logExitCode } from "../error-handler.js";
import { log } from "../logger.js";
import { build } from "./build.js";
import { down } from "./down.js";
import { help } from "./help.js";
import { logs } from "./logs.js";
import { buildDepends, piaCreds, requireCredentials, requireDependencies } from "./preflight.js";
import type {
  AliasOperation,
  CanonicalOperation,
  OperationContext,
  OperationHandler,
  OperationName,
  Precondition,
} from "./types.js";
import { up } from "./up.js";

export type { CanonicalOperation, OperationContext, OperationHandler, OperationName } from "./types.js";
export { HELP_TEXT, OPERATION_DESCRIPTIONS } from "./help.js";

export const OPERATION_ALIASES: Readonly<Record<AliasOperation, CanonicalOperation>> = {
  default: "up",
  clean: "down",
  run: "up",
};

export const OPERATIONS: Readonly<Record<CanonicalOperation, OperationHandler>> = {
  "build-depends": buildDepends,
  "pia-creds": piaCreds,
  build,
  up,
  down,
  logs,
  help,
};

export const PRECONDITIONS: Readonly<Record<CanonicalOperation, readonly Precondition[]>> = {
  "build-depends": [],
  "pia-creds": [],
  build: [requireDependencies, requireCredentials],
  up: [requireDependencies, requireCredentials],
  down: [requireDependencies],
  logs: [],
  help: [],
};

function isAlias(name: string): name is AliasOperation {
  return Object.hasOwn(OPERATION_ALIASES, name);
}

function isCanonical(name: string): name is CanonicalOperation {
  return Object.hasOwn(OPERATIONS, name);
}

export const CANONICAL_OPERATIONS: readonly CanonicalOperation[] = Object.keys(OPERATIONS).filter(isCanonical);

export function isOperationName(name: string): name is OperationName {
  return isAlias(name) || isCanonical(name);
}

/**
 * Resolve an operation name (or alias) to the operation that defines it.
 *
 * @throws ValidationError for an unknown name.
 */
export function resolveOperation(name: string): CanonicalOperation {
  if (isAlias(name)) {
    return OPERATION_ALIASES[name];
  }
  if (isCanonical(name)) {
    return name;
  }
  throw new ValidationError(`Unknown operation '${name}'. Run '${CLI_NAME} help' for a list.`);
}

/**
 * Run an operation: preconditions first, then the handler.
 *
 * @returns The handler's exit status (the wrapped tool's, when it fails).
 * @throws ComposeCtlError subclasses from failing preconditions.
 */
export async function dispatch(name: string, ctx: OperationContext): Promise<number> {
  const operation = resolveOperation(name);
  if (operation !== name) {
    log.debug(`${name} -> ${operation}`);
  }

  for (const precondition of PRECONDITIONS[operation]) {
    precondition(ctx);
  }

  const exitCode = await OPERATIONS[operation](ctx);
  logExitCode(exitCode, operation);
  return exitCode;
}
