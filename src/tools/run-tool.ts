/**
 * External tool execution.
 *
 * Tools run one at a time. A non-zero exit is an ordinary outcome the caller
 * interprets; only a timeout is reported separately. A tool that cannot be
 * spawned at all (missing binary) reads as exit code 127, and one killed by
 * a signal as 128 plus the signal number, like a shell.
 */

import { execFile } from "node:child_process";
import { constants } from "node:os";

export type ToolOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "timeout"; command: string; timeoutMs: number };

export interface RunToolOptions {
  /** 0 disables the timeout. */
  timeoutMs: number;
}

export type ToolRunner = (
  command: string,
  args: readonly string[],
  options: RunToolOptions,
) => Promise<ToolOutcome>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;
const SPAWN_FAILURE_EXIT = 127;
const SIGNAL_EXIT_BASE = 128;

export const runTool: ToolRunner = (command, args, options) =>
  new Promise((resolvePromise) => {
    execFile(
      command,
      [...args],
      {
        encoding: "utf8",
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
      },
      (error, stdout, stderr) => {
        if (error === null) {
          resolvePromise({ kind: "exited", exitCode: 0, stdout, stderr });
          return;
        }
        if (options.timeoutMs > 0 && error.killed === true) {
          resolvePromise({ kind: "timeout", command, timeoutMs: options.timeoutMs });
          return;
        }
        if (typeof error.code !== "number" && error.signal) {
          resolvePromise({
            kind: "exited",
            exitCode: SIGNAL_EXIT_BASE + signalNumber(error.signal),
            stdout,
            stderr: `${stderr}${command} terminated by ${error.signal}`,
          });
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : SPAWN_FAILURE_EXIT;
        resolvePromise({
          kind: "exited",
          exitCode,
          stdout,
          stderr: stderr !== "" ? stderr : error.message,
        });
      },
    );
  });

function signalNumber(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry?.[1] ?? 0;
}

export function describeCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}
