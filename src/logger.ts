/**
 * Unified logging abstraction for privateerr-compose.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All output of this tool MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 * Output of the wrapped docker-compose process is inherited, not logged.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
}

/** Global logger configuration. */
const config: LoggerConfig = {
  level: LogLevel.INFO,
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Enable quiet mode: suppress all of this tool's own output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("Found docker in PATH")
 *   log.warn("No images found for alpine")
 *   log.error("Please set PIA_USER")
 *   log.dim("docker-compose down --volumes")
 *   log.bold("Stopping services")
 */
export const log = {
  /** Debug-level message, dim gray. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(message));
    }
  },

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(message));
    }
  },

  /**
   * Raw output without any styling.
   * Respects log level (info).
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  newline(): void {
    if (canOutput(LogLevel.INFO)) {
      console.log();
    }
  },
};
