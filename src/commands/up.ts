/**
 * Build, (re)create and start the service stack.
 */

import { runCompose } from "../compose.js";
import { log } from "../logger.js";
import type { OperationContext } from "./types.js";

export async function up(ctx: OperationContext): Promise<number> {
  log.newline();
  log.bold(`Starting service ${ctx.config.serviceName}`);
  return runCompose(ctx.runner, "up", ctx.config);
}
