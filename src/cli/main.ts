/**
 * Command dispatch, separate from the process entry point so it can run
 * in-process.
 */

import { parseArgs } from "./args.js";
import {
  cmdCheckIds,
  cmdConfigShow,
  cmdValidate,
  EXIT_OK,
  EXIT_USAGE,
  type CliContext,
} from "./commands.js";

export const USAGE = `installguard: macOS installer artifact validation

Usage:
  installguard validate <path> --ids <file> [--recipe <name>] [--config <file>]
      [--fail-on-world-writable <bool>] [--fail-on-setuid <bool>]
      [--fail-on-symlink-escape <bool>] [--allow-symlink-prefix <path>]...
      [--timeout-ms <n>] [--verbose] [--json]
  installguard check-ids <file> [--json]
  installguard config show [--config <file>] [--json]

<path> is a .pkg, .dmg or .app, or a directory to search for one.

Exit codes:
  0 = PASS
  1 = usage or configuration error
  2 = unexpected error
  3 = FAIL (validation failed)

Environment:
  INSTALLGUARD_CONFIG, INSTALLGUARD_ID_FILE, INSTALLGUARD_FAIL_ON_WORLD_WRITABLE,
  INSTALLGUARD_FAIL_ON_SETUID, INSTALLGUARD_FAIL_ON_SYMLINK_ESCAPE,
  INSTALLGUARD_VERBOSE, INSTALLGUARD_ALLOWED_SYMLINK_PREFIXES,
  INSTALLGUARD_RECIPE_NAME (or NAME), INSTALLGUARD_TOOL_TIMEOUT_MS
`;

export async function main(argv: readonly string[], ctx: CliContext): Promise<number> {
  if (argv.length === 0) {
    ctx.streams.stderr.write(USAGE);
    return EXIT_USAGE;
  }

  const args = parseArgs(argv);

  if (args.boolFlags.has("help") || args.positional[0] === "help") {
    ctx.streams.stdout.write(USAGE);
    return EXIT_OK;
  }

  const command = args.positional[0];

  switch (command) {
    case "validate":
      return cmdValidate(args, ctx);

    case "check-ids":
      return cmdCheckIds(args, ctx);

    case "config":
      if (args.positional[1] === "show") {
        return cmdConfigShow(args, ctx);
      }
      ctx.streams.stderr.write("Unknown config subcommand. Use: config show\n");
      return EXIT_USAGE;

    default:
      ctx.streams.stderr.write(`Unknown command: ${command ?? ""}\n\n${USAGE}`);
      return EXIT_USAGE;
  }
}
