#!/usr/bin/env node
/**
 * wordforge.ts - CLI entry point
 *
 * @license MIT
 */

import { formatError } from "./WordforgeError";
import { runCli } from "./WordforgeCLI";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  }
);
