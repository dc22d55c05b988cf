#!/usr/bin/env node
/**
 * CLI entry point for privateerr-compose.
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync();
