/**
 * Configuration resolution for privateerr-compose.
 *
 * Environment-driven defaults are resolved once at startup into an explicit
 * ComposeConfig, which is passed to every operation handler.
 *
 * Dependency direction:
 *   This module imports from: constants.ts
 *   It should NOT import from: cli, program, commands
 */

import { resolve } from "node:path";

import {
  COMPOSE_ENV,
  DEFAULT_BUILD_OPTIONS,
  DEFAULT_DOWN_TIMEOUT,
  DEFAULT_LOGS_OPTIONS,
  DEFAULT_SERVICE_NAME,
  DEFAULT_UP_OPTIONS,
  DEPENDENCIES,
  DOCKERFILE_PATH,
  defaultDownOptions,
} from "./constants.js";

export type Environment = Readonly<Record<string, string | undefined>>;

/** Resolved configuration for a single invocation. */
export interface ComposeConfig {
  readonly serviceName: string;
  /**
   * Seconds before containers are force-stopped during teardown. Passed to
   * docker-compose as given; only used when COMPOSE_DOWN_OPTIONS is unset.
   */
  readonly downTimeout: string;
  readonly downOptions: readonly string[];
  readonly buildOptions: readonly string[];
  readonly upOptions: readonly string[];
  readonly logsOptions: readonly string[];
  readonly dependencies: readonly string[];
  /** Absolute path of the Dockerfile the base image reference is read from. */
  readonly dockerfile: string;
}

/**
 * Split an option string into arguments on runs of whitespace.
 */
export function splitOptions(options: string): string[] {
  return options.split(/\s+/).filter(Boolean);
}

/**
 * Read a variable, falling back only when it is unset.
 * A variable set to the empty string is an explicit (empty) override.
 */
function envOr(env: Environment, name: string, fallback: string): string {
  return env[name] ?? fallback;
}

/**
 * Resolve configuration from the environment.
 *
 * @param env - Environment to read (defaults to process.env).
 * @param cwd - Directory the Dockerfile path is resolved against.
 */
export function resolveComposeConfig(
  env: Environment = process.env,
  cwd: string = process.cwd()
): ComposeConfig {
  const downTimeout = envOr(env, COMPOSE_ENV.DOWN_TIMEOUT, DEFAULT_DOWN_TIMEOUT);

  return {
    serviceName: envOr(env, COMPOSE_ENV.SERVICE_NAME, DEFAULT_SERVICE_NAME),
    downTimeout,
    downOptions: splitOptions(envOr(env, COMPOSE_ENV.DOWN_OPTIONS, defaultDownOptions(downTimeout))),
    buildOptions: splitOptions(envOr(env, COMPOSE_ENV.BUILD_OPTIONS, DEFAULT_BUILD_OPTIONS)),
    upOptions: splitOptions(envOr(env, COMPOSE_ENV.UP_OPTIONS, DEFAULT_UP_OPTIONS)),
    logsOptions: splitOptions(envOr(env, COMPOSE_ENV.LOGS_OPTIONS, DEFAULT_LOGS_OPTIONS)),
    dependencies: DEPENDENCIES,
    dockerfile: resolve(cwd, DOCKERFILE_PATH),
  };
}
