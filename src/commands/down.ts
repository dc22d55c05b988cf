/**
 * Tear down the service stack, then remove images built on its base image.
 */

import { removeImagesByReference, runCompose } from "../compose.js";
import { extractBaseImage } from "../dockerfile.js";
import { log } from "../logger.js";
import type { OperationContext } from "./types.js";

export async function down(ctx: OperationContext): Promise<number> {
  const { config, runner } = ctx;

  log.newline();
  log.bold(`Stopping service ${config.serviceName}`);
  const exitCode = await runCompose(runner, "down", config);
  if (exitCode !== 0) {
    return exitCode;
  }

  const baseImage = extractBaseImage(config.dockerfile);
  log.newline();
  log.bold(`Removing images based on ${baseImage}`);
  const removed = await removeImagesByReference(runner, baseImage);
  if (removed > 0) {
    log.dim(`Removed ${removed} image(s)`);
  }

  return 0;
}
