/**
 * privateerr-compose - build, start, stop and inspect the privateerr stack.
 *
 * This is the main entry point for the library surface.
 */

// Re-export main types and functions
export { VERSION, DEPENDENCIES, DOCKERFILE_PATH } from "./constants.js";
export { type ComposeConfig, type Environment, resolveComposeConfig, splitOptions } from "./config.js";
export { ComposeCtlError, CredentialError, DependencyError, ValidationError } from "./errors.js";
export { type CommandRunner, type ExecResult, ExecaRunner, commandExists } from "./exec.js";
export { checkCredentials, checkDependencies } from "./preflight.js";
export { extractBaseImage, parseBaseImage } from "./dockerfile.js";
export { composeArgs, removeImagesByReference, runCompose } from "./compose.js";
export {
  type OperationContext,
  type OperationName,
  HELP_TEXT,
  OPERATION_ALIASES,
  dispatch,
  isOperationName,
  resolveOperation,
} from "./commands/index.js";
export { createProgram, type ProgramDeps } from "./program.js";
