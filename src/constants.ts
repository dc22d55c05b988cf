/**
 * Constants module for privateerr-compose.
 *
 * Defaults, environment variable names and fixed paths are defined here (SSOT).
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
export const VERSION: string =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

// === Naming (SSOT) ===
export const CLI_NAME = "privateerr";

// === External tools ===
export const COMPOSE_BINARY = "docker-compose";
export const DOCKER_BINARY = "docker";

/** Executables that must resolve on PATH before the orchestration tool is invoked. */
export const DEPENDENCIES: readonly string[] = [DOCKER_BINARY, COMPOSE_BINARY];

// === Paths ===
export const DOCKERFILE_PATH = "docker/Dockerfile";

// === Compose Environment Variables (SSOT for names) ===
export const COMPOSE_ENV = {
  SERVICE_NAME: "COMPOSE_SERVICE_NAME",
  DOWN_TIMEOUT: "COMPOSE_DOWN_TIMEOUT",
  DOWN_OPTIONS: "COMPOSE_DOWN_OPTIONS",
  BUILD_OPTIONS: "COMPOSE_BUILD_OPTIONS",
  UP_OPTIONS: "COMPOSE_UP_OPTIONS",
  LOGS_OPTIONS: "COMPOSE_LOGS_OPTIONS",
} as const;

// === Credentials (checked in this order) ===
export const CREDENTIAL_ENV = ["PIA_USER", "PIA_PASS"] as const;

// === Compose Defaults ===
export const DEFAULT_SERVICE_NAME = "privateerr";
export const DEFAULT_DOWN_TIMEOUT = "30"; // seconds before containers are force-stopped
export const DEFAULT_BUILD_OPTIONS = "--pull --no-cache";
export const DEFAULT_UP_OPTIONS = "--build --force-recreate --pull always";
export const DEFAULT_LOGS_OPTIONS = "--follow";

/** Teardown options; the timeout is interpolated from COMPOSE_DOWN_TIMEOUT. */
export function defaultDownOptions(timeout: string): string {
  return `--timeout ${timeout} --rmi all --volumes`;
}
