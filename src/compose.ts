/**
 * docker-compose and docker invocations for privateerr-compose.
 *
 * Composes argument lists from the resolved configuration and hands them to
 * a CommandRunner. Output of the tools is never parsed, except for the image
 * IDs listed during best-effort cleanup.
 */

import { COMPOSE_BINARY, DOCKER_BINARY } from "./constants.js";
import type { ComposeConfig } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { log } from "./logger.js";

export type ComposeSubcommand = "build" | "up" | "down" | "logs";

/**
 * Argument list for a docker-compose subcommand.
 * Only `build` names the service; the other subcommands act on the whole stack.
 */
export function composeArgs(subcommand: ComposeSubcommand, config: ComposeConfig): string[] {
  switch (subcommand) {
    case "build":
      return ["build", ...config.buildOptions, config.serviceName];
    case "up":
      return ["up", ...config.upOptions];
    case "down":
      return ["down", ...config.downOptions];
    case "logs":
      return ["logs", ...config.logsOptions];
  }
}

/** Echo a command line before running it. */
function echo(command: string, args: readonly string[]): void {
  log.dim([command, ...args].join(" "));
}

/**
 * Run a docker-compose subcommand with inherited stdio.
 *
 * @returns docker-compose's exit status.
 */
export async function runCompose(
  runner: CommandRunner,
  subcommand: ComposeSubcommand,
  config: ComposeConfig
): Promise<number> {
  const args = composeArgs(subcommand, config);
  echo(COMPOSE_BINARY, args);
  return runner.run(COMPOSE_BINARY, args);
}

/**
 * Force-remove every local image matching a reference.
 *
 * Best-effort: an empty reference, zero matches, or a failing docker call
 * never throws. Failures are reported as warnings.
 *
 * @returns Number of images removed.
 */
export async function removeImagesByReference(runner: CommandRunner, reference: string): Promise<number> {
  if (!reference) {
    log.dim("No base image reference found, skipping image removal");
    return 0;
  }

  try {
    const listed = await runner.capture(DOCKER_BINARY, ["images", "-q", reference]);
    if (listed.exitCode !== 0) {
      log.warn(`Could not list images for ${reference} (exit ${listed.exitCode})`);
      return 0;
    }

    const ids = [...new Set(listed.stdout.split(/\s+/).filter(Boolean))];
    if (ids.length === 0) {
      log.dim(`No images based on ${reference}`);
      return 0;
    }

    const args = ["rmi", "-f", ...ids];
    echo(DOCKER_BINARY, args);
    const exitCode = await runner.run(DOCKER_BINARY, args);
    if (exitCode !== 0) {
      log.warn(`Image removal for ${reference} failed (exit ${exitCode})`);
      return 0;
    }
    return ids.length;
  } catch (error: unknown) {
    log.warn(`Image removal for ${reference} failed: ${error instanceof Error ? error.message : String(error)}`);
    return 0;
  }
}
