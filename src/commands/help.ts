/**
 * Static usage text.
 */

import { CLI_NAME } from "../constants.js";
import { log } from "../logger.js";
import type { OperationName } from "./types.js";

/** One-line description per operation, in the order help lists them. */
export const OPERATION_DESCRIPTIONS: ReadonlyArray<readonly [OperationName, string]> = [
  ["default", "Builds and starts the service stack (runs when no operation is given)."],
  ["build-depends", "Ensures build dependencies are installed."],
  ["pia-creds", "Ensures Private Internet Access credentials are set."],
  ["down", "Stops and removes containers, networks, volumes, and images."],
  ["clean", "Alias for down."],
  ["build", "Builds the service stack."],
  ["up", "Builds, (re)creates, and starts containers for services."],
  ["run", "Alias for up."],
  ["logs", "Shows logs for the service."],
  ["help", "Displays this help message."],
];

const NAME_WIDTH = 15;

export const HELP_TEXT = [
  `Usage: ${CLI_NAME} [OPERATION]`,
  "",
  "Operations:",
  ...OPERATION_DESCRIPTIONS.map(([name, description]) => `  ${name.padEnd(NAME_WIDTH)} - ${description}`),
].join("\n");

export async function help(): Promise<number> {
  log.raw(HELP_TEXT);
  return 0;
}
