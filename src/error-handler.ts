/**
 * Exit status reporting for privateerr-compose.
 *
 * Failures of the wrapped tools are propagated as exit statuses; this module
 * only describes them to the user.
 */

import { log } from "./logger.js";

/** Known exit statuses with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Command completed successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "Command failed",
    suggestion: "See the docker-compose output above for details",
    severity: "error",
  },
  2: {
    code: 2,
    name: "MISUSE",
    description: "Invalid command-line usage",
    suggestion: "Check the COMPOSE_*_OPTIONS environment variables",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Verify docker and docker-compose are installed and in PATH",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "KILLED",
    description: "Process was killed (OOM or manual stop)",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Exited with status ${code}`,
      severity: "warn" as const,
    }
  );
}

/**
 * Check if an exit code indicates user-initiated termination (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143; // SIGINT (Ctrl+C) or SIGTERM
}

export function isSuccess(code: number): boolean {
  return code === 0;
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (isSuccess(code)) {
    return;
  }

  const info = getExitCodeInfo(code);

  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const contextStr = context ? ` (${context})` : "";

  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}
