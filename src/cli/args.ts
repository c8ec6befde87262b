/**
 * Minimal argv parser.
 *
 * `--name value` sets a flag (repeatable, every value kept in order);
 * `--name` followed by another flag or nothing is a boolean flag;
 * everything else is positional. Switches never take a value, and
 * `--verbose` takes one only when it is a boolean word.
 */

const SWITCHES = new Set(["json", "help"]);
const OPTIONAL_BOOL = new Set(["verbose"]);
const BOOL_WORDS = new Set(["true", "false", "yes", "no", "1", "0"]);

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string[]>;
  boolFlags: Set<string>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string[]>();
  const boolFlags = new Set<string>();

  const add = (name: string, value: string): void => {
    const values = flags.get(name);
    if (values) values.push(value);
    else flags.set(name, [value]);
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      const takesValue =
        next !== undefined &&
        !next.startsWith("--") &&
        !SWITCHES.has(name) &&
        (!OPTIONAL_BOOL.has(name) || BOOL_WORDS.has(next.trim().toLowerCase()));
      if (next !== undefined && takesValue) {
        add(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        add(name, "true");
        i += 1;
      }
    } else if (arg === "-h") {
      boolFlags.add("help");
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}

/** Last value given for a flag. */
export function flagValue(args: ParsedArgs, name: string): string | undefined {
  const values = args.flags.get(name);
  return values?.[values.length - 1];
}

export function flagValues(args: ParsedArgs, name: string): string[] {
  return args.flags.get(name) ?? [];
}
