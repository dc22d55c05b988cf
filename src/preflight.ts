/**
 * Pre-flight checks run before the orchestration tool is invoked.
 *
 * Both checks fail fast: the first problem found is thrown and nothing
 * after it runs.
 */

import type { Environment } from "./config.js";
import { CREDENTIAL_ENV } from "./constants.js";
import { CredentialError, DependencyError } from "./errors.js";
import { log } from "./logger.js";

/**
 * Ensure every required executable resolves on PATH.
 *
 * @throws DependencyError naming the first missing executable.
 */
export function checkDependencies(
  dependencies: readonly string[],
  commandExists: (command: string) => boolean
): void {
  for (const exe of dependencies) {
    if (!commandExists(exe)) {
      throw new DependencyError(exe);
    }
    log.debug(`Found ${exe} in PATH`);
  }
}

/**
 * Ensure the Private Internet Access credentials are set and non-empty.
 * PIA_USER is checked before PIA_PASS; only the first failure is reported.
 *
 * @throws CredentialError naming the missing variable.
 */
export function checkCredentials(env: Environment): void {
  for (const name of CREDENTIAL_ENV) {
    if (!env[name]) {
      throw new CredentialError(name);
    }
  }
}
