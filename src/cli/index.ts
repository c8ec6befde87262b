#!/usr/bin/env node
/**
 * installguard: CLI entry point.
 *
 * Usage:
 *   installguard <command> [options]
 *
 * Commands:
 *   validate <path> --ids <file>   Validate a .pkg, .dmg or .app
 *   check-ids <file>               Lint a trusted team ID list
 *   config show [--json]           Show resolved options
 */

import { main } from "./main.js";
import { EXIT_FATAL } from "./commands.js";

main(process.argv.slice(2), { env: process.env, streams: process }).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(EXIT_FATAL);
  },
);
