/**
 * Progress output for a validation run.
 *
 * info  -> stdout, one line per passed stage
 * warn  -> stderr, "warning: " prefix
 * debug -> stdout, only when verbose
 */

export interface ValidationLog {
  info(msg: string): void;
  warn(msg: string): void;
  debug(msg: string): void;
}

export interface LogStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export function createStreamLog(
  verbose: boolean,
  streams: LogStreams = process,
): ValidationLog {
  return {
    info: (msg) => {
      streams.stdout.write(msg + "\n");
    },
    warn: (msg) => {
      streams.stderr.write(`warning: ${msg}\n`);
    },
    debug: (msg) => {
      if (verbose) streams.stdout.write(`  ${msg}\n`);
    },
  };
}

/** Keeps lines in memory; used for --json runs and in tests. */
export class MemoryLog implements ValidationLog {
  readonly lines: { level: "info" | "warn" | "debug"; msg: string }[] = [];

  info(msg: string): void {
    this.lines.push({ level: "info", msg });
  }

  warn(msg: string): void {
    this.lines.push({ level: "warn", msg });
  }

  debug(msg: string): void {
    this.lines.push({ level: "debug", msg });
  }

  messages(level: "info" | "warn" | "debug"): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.msg);
  }
}
