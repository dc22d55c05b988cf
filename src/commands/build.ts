/**
 * Build the service image.
 */

import { runCompose } from "../compose.js";
import { log } from "../logger.js";
import type { OperationContext } from "./types.js";

export async function build(ctx: OperationContext): Promise<number> {
  log.newline();
  log.bold(`Building service ${ctx.config.serviceName}`);
  return runCompose(ctx.runner, "build", ctx.config);
}
