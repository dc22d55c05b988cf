/**
 * Base image extraction from the service Dockerfile.
 */

import { readFileSync } from "node:fs";

import { log } from "./logger.js";

/** A build stage declaration: `FROM` at column 0 followed by whitespace. */
const FROM_LINE = /^FROM\s/;

/**
 * Parse the base image reference out of Dockerfile contents.
 *
 * Takes the first `FROM` line, skips build flags such as `--platform=...`,
 * and strips the tag from the first `:` onward. Returns "" when there is no
 * `FROM` line or it names no image.
 */
export function parseBaseImage(contents: string): string {
  const line = contents.split(/\r?\n/).find((l) => FROM_LINE.test(l));
  if (line === undefined) {
    return "";
  }

  const image = line
    .trim()
    .split(/\s+/)
    .slice(1)
    .find((token) => !token.startsWith("--"));

  if (image === undefined) {
    return "";
  }

  const colon = image.indexOf(":");
  return colon === -1 ? image : image.slice(0, colon);
}

/**
 * Read the base image reference from a Dockerfile on disk.
 *
 * A missing or unreadable file yields "" (no base image).
 */
export function extractBaseImage(dockerfile: string): string {
  let contents: string;
  try {
    contents = readFileSync(dockerfile, "utf-8");
  } catch (e) {
    log.debug(`Cannot read ${dockerfile}: ${e instanceof Error ? e.message : String(e)}`);
    return "";
  }
  return parseBaseImage(contents);
}
