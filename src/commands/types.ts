/**
 * Shared types for operation handlers.
 */

import type { ComposeConfig, Environment } from "../config.js";
import type { CommandRunner } from "../exec.js";

/** Operations that have their own handler. */
export type CanonicalOperation = "build-depends" | "pia-creds" | "build" | "up" | "down" | "logs" | "help";

/** Operations that re-invoke another operation's definition. */
export type AliasOperation = "default" | "clean" | "run";

export type OperationName = CanonicalOperation | AliasOperation;

/** Everything a handler may touch, resolved once per invocation. */
export interface OperationContext {
  readonly config: ComposeConfig;
  readonly env: Environment;
  readonly runner: CommandRunner;
  readonly commandExists: (command: string) => boolean;
}

/** Runs an operation and resolves to its exit status. */
export type OperationHandler = (ctx: OperationContext) => Promise<number>;

/** Check run before a handler; throws a ComposeCtlError to abort. */
export type Precondition = (ctx: OperationContext) => void;
