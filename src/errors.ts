/**
 * Unified exception hierarchy for privateerr-compose.
 *
 * All custom exceptions inherit from ComposeCtlError for consistent error handling.
 * The CLI catches these, prints the message, and exits with `exitCode`.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other modules.
 */

/**
 * Base exception for all privateerr-compose errors.
 *
 * Failures of the orchestration tool itself are NOT errors: they are exit
 * statuses returned by the command runner and propagated unchanged.
 */
export class ComposeCtlError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ComposeCtlError";
    this.exitCode = exitCode;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Raised when a required executable is not on PATH. */
export class DependencyError extends ComposeCtlError {
  readonly executable: string;

  constructor(executable: string, message = `No ${executable} in PATH`) {
    super(message);
    this.name = "DependencyError";
    this.executable = executable;
  }
}

/** Raised when a required credential variable is unset or empty. */
export class CredentialError extends ComposeCtlError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Please set ${variable}`);
    this.name = "CredentialError";
    this.variable = variable;
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Unknown operation name
 */
export class ValidationError extends ComposeCtlError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
