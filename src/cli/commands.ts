/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments and a context (env, output streams)
 *   - calls library functions (no business logic here)
 *   - returns an exit code
 */

import { existsSync, readFileSync } from "node:fs";
import type { ParsedArgs } from "./args.js";
import { resolveOptions, trustedIdFilePath, type Env } from "./config.js";
import { ValidationError } from "../pipeline/errors.js";
import { canonicalJson } from "../pipeline/canonical.js";
import { createStreamLog, type LogStreams } from "../pipeline/log.js";
import { ValidationPipeline } from "../pipeline/pipeline.js";
import type { ValidatorOptions } from "../pipeline/options.js";
import { loadTrustedIds, parseTrustedIds } from "../signing/trusted-ids.js";
import { expandHome } from "../target/resolve.js";
import type { Collaborators } from "../tools/collaborators.js";
import { createMacCollaborators } from "../tools/macos.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FATAL = 2;
export const EXIT_FAILED = 3;

export interface CliContext {
  env: Env;
  streams: LogStreams;
  /** Defaults to the macOS tools. */
  collaborators?: (options: ValidatorOptions) => Collaborators;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(ctx: CliContext, msg: string): void {
  ctx.streams.stderr.write(`error: ${msg}\n`);
}

function out(ctx: CliContext, msg: string): void {
  ctx.streams.stdout.write(msg + "\n");
}

/** Runs `fn`, turning configuration errors into a usage exit code. */
function withConfig<T>(ctx: CliContext, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (e: unknown) {
    if (e instanceof ValidationError) {
      err(ctx, e.message);
      return undefined;
    }
    throw e;
  }
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

export async function cmdValidate(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const json = args.boolFlags.has("json");
  const inputPath = args.positional[1];
  const idFile = trustedIdFilePath(args, ctx.env);
  if (!inputPath || !idFile) {
    err(ctx, "Usage: installguard validate <path> --ids <file>");
    return EXIT_USAGE;
  }

  const loaded = withConfig(ctx, () => ({
    options: resolveOptions(args, ctx.env),
    trustedIds: loadTrustedIds(idFile),
  }));
  if (!loaded) return EXIT_USAGE;
  const { options, trustedIds } = loaded;

  // With --json, stdout carries only the report.
  const log = createStreamLog(
    options.verbose,
    json ? { stdout: ctx.streams.stderr, stderr: ctx.streams.stderr } : ctx.streams,
  );
  const collaborators = (ctx.collaborators ?? defaultCollaborators)(options);
  const pipeline = new ValidationPipeline(options, collaborators, log);
  const report = await pipeline.run({ inputPath, trustedIds });

  if (json) {
    out(ctx, canonicalJson(report));
  } else if (report.failure) {
    err(ctx, `${report.failure.code}: ${report.failure.message}`);
  }
  return report.passed ? EXIT_OK : EXIT_FAILED;
}

function defaultCollaborators(options: ValidatorOptions): Collaborators {
  return createMacCollaborators({ timeoutMs: options.toolTimeoutMs });
}

// ---------------------------------------------------------------------------
// check-ids
// ---------------------------------------------------------------------------

export function cmdCheckIds(args: ParsedArgs, ctx: CliContext): number {
  const json = args.boolFlags.has("json");
  const file = args.positional[1] ?? trustedIdFilePath(args, ctx.env);
  if (!file) {
    err(ctx, "Usage: installguard check-ids <file>");
    return EXIT_USAGE;
  }

  const abs = expandHome(file);
  if (!existsSync(abs)) {
    err(ctx, `File not found: ${abs}`);
    return EXIT_USAGE;
  }
  const entries = withConfig(ctx, () => parseTrustedIds(readFileSync(abs, "utf8"), abs));
  if (!entries) return EXIT_USAGE;

  const unique = [...new Set(entries.map((e) => e.teamId))];
  const duplicates = entries.length - unique.length;

  if (json) {
    out(ctx, canonicalJson({ valid: unique.length > 0, file: abs, teamIds: unique, duplicates }));
  } else {
    out(ctx, `${unique.length} trusted team ID(s) in ${abs}`);
    for (const id of unique) out(ctx, `  ${id}`);
    if (duplicates > 0) out(ctx, `${duplicates} duplicate line(s)`);
  }

  if (unique.length === 0) {
    err(ctx, `No team IDs in ${abs}`);
    return EXIT_USAGE;
  }
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(args: ParsedArgs, ctx: CliContext): number {
  const json = args.boolFlags.has("json");
  const options = withConfig(ctx, () => resolveOptions(args, ctx.env));
  if (!options) return EXIT_USAGE;

  if (json) {
    out(ctx, canonicalJson(options));
  } else {
    out(ctx, `failOnWorldWritable:    ${options.failOnWorldWritable}`);
    out(ctx, `failOnSetuid:           ${options.failOnSetuid}`);
    out(ctx, `failOnSymlinkEscape:    ${options.failOnSymlinkEscape}`);
    out(ctx, `verbose:                ${options.verbose}`);
    out(ctx, `allowedSymlinkPrefixes: ${options.allowedSymlinkPrefixes.join(", ") || "(none)"}`);
    out(ctx, `recipeHint:             ${options.recipeHint ?? "(none)"}`);
    out(ctx, `toolTimeoutMs:          ${options.toolTimeoutMs}`);
  }
  return EXIT_OK;
}
