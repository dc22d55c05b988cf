/**
 * Stream service logs until docker-compose exits or the user interrupts it.
 */

import { runCompose } from "../compose.js";
import { log } from "../logger.js";
import type { OperationContext } from "./types.js";

export async function logs(ctx: OperationContext): Promise<number> {
  log.newline();
  log.bold(`Getting logs for service ${ctx.config.serviceName}`);
  return runCompose(ctx.runner, "logs", ctx.config);
}
