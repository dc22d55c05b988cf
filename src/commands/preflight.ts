/**
 * Pre-flight operations: the dependency and credential checks on their own.
 */

import { log } from "../logger.js";
import { checkCredentials, checkDependencies } from "../preflight.js";
import type { OperationContext, Precondition } from "./types.js";

export const requireDependencies: Precondition = (ctx) => {
  checkDependencies(ctx.config.dependencies, ctx.commandExists);
};

export const requireCredentials: Precondition = (ctx) => {
  checkCredentials(ctx.env);
};

export async function buildDepends(ctx: OperationContext): Promise<number> {
  requireDependencies(ctx);
  log.success(`Found ${ctx.config.dependencies.join(", ")}`);
  return 0;
}

export async function piaCreds(ctx: OperationContext): Promise<number> {
  requireCredentials(ctx);
  log.success("PIA_USER and PIA_PASS are set");
  return 0;
}
