/**
 * CLI configuration: resolve ValidatorOptions from layered sources.
 *
 * Later layers win:
 *   1. defaults
 *   2. YAML config file (--config <file> or INSTALLGUARD_CONFIG)
 *   3. environment
 *   4. command-line flags
 *
 * Environment:
 *   INSTALLGUARD_CONFIG                     path to a YAML config file
 *   INSTALLGUARD_ID_FILE                    trusted team ID list
 *   INSTALLGUARD_FAIL_ON_WORLD_WRITABLE     bool
 *   INSTALLGUARD_FAIL_ON_SETUID             bool
 *   INSTALLGUARD_FAIL_ON_SYMLINK_ESCAPE     bool
 *   INSTALLGUARD_VERBOSE                    bool
 *   INSTALLGUARD_ALLOWED_SYMLINK_PREFIXES   path-delimiter separated list
 *   INSTALLGUARD_RECIPE_NAME (or NAME)      candidate disambiguation hint
 *   INSTALLGUARD_TOOL_TIMEOUT_MS            per-tool timeout, 0 disables
 */

import { existsSync, readFileSync } from "node:fs";
import { delimiter } from "node:path";
import yaml from "yaml";
import { ZodError } from "zod";
import { flagValue, flagValues, type ParsedArgs } from "./args.js";
import { ValidationError, describeError } from "../pipeline/errors.js";
import {
  ValidatorOptionsSchema,
  defineOptions,
  type ValidatorOptions,
  type ValidatorOptionsInput,
} from "../pipeline/options.js";
import { expandHome } from "../target/resolve.js";

export type Env = Record<string, string | undefined>;

const TRUE_WORDS = new Set(["true", "yes", "1"]);
const FALSE_WORDS = new Set(["false", "no", "0"]);

export function parseBool(value: string, source: string): boolean {
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new ValidationError(
    `${source}: expected a boolean (true/false, yes/no, 1/0), got "${value}"`,
    "CONFIG_INVALID",
    { source, value },
  );
}

export function parseTimeout(value: string, source: string): number {
  const n = Number(value.trim());
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(
      `${source}: expected a non-negative integer, got "${value}"`,
      "CONFIG_INVALID",
      { source, value },
    );
  }
  return n;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

export function configFilePath(args: ParsedArgs, env: Env): string | undefined {
  return flagValue(args, "config") ?? env["INSTALLGUARD_CONFIG"];
}

export function loadConfigFile(filePath: string): ValidatorOptionsInput {
  const abs = expandHome(filePath);
  if (!existsSync(abs)) {
    throw new ValidationError(`Config file not found: ${abs}`, "CONFIG_INVALID", { path: abs });
  }

  let raw: unknown;
  try {
    raw = yaml.parse(readFileSync(abs, "utf8"));
  } catch (e: unknown) {
    throw new ValidationError(`${abs}: invalid YAML: ${describeError(e)}`, "CONFIG_INVALID", {
      path: abs,
    });
  }
  // An empty file parses to null.
  if (raw === null || raw === undefined) return {};

  const parsed = ValidatorOptionsSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${abs}: ${formatZodError(parsed.error)}`, "CONFIG_INVALID", {
      path: abs,
    });
  }
  return parsed.data;
}

export function envLayer(env: Env): ValidatorOptionsInput {
  const layer: ValidatorOptionsInput = {};
  const bool = (name: string): boolean | undefined => {
    const v = env[name];
    return v === undefined || v === "" ? undefined : parseBool(v, name);
  };

  const failOnWorldWritable = bool("INSTALLGUARD_FAIL_ON_WORLD_WRITABLE");
  if (failOnWorldWritable !== undefined) layer.failOnWorldWritable = failOnWorldWritable;
  const failOnSetuid = bool("INSTALLGUARD_FAIL_ON_SETUID");
  if (failOnSetuid !== undefined) layer.failOnSetuid = failOnSetuid;
  const failOnSymlinkEscape = bool("INSTALLGUARD_FAIL_ON_SYMLINK_ESCAPE");
  if (failOnSymlinkEscape !== undefined) layer.failOnSymlinkEscape = failOnSymlinkEscape;
  const verbose = bool("INSTALLGUARD_VERBOSE");
  if (verbose !== undefined) layer.verbose = verbose;

  const prefixes = env["INSTALLGUARD_ALLOWED_SYMLINK_PREFIXES"];
  if (prefixes) {
    layer.allowedSymlinkPrefixes = prefixes.split(delimiter).filter((p) => p !== "");
  }

  const recipe = env["INSTALLGUARD_RECIPE_NAME"] || env["NAME"];
  if (recipe) layer.recipeHint = recipe;

  const timeout = env["INSTALLGUARD_TOOL_TIMEOUT_MS"];
  if (timeout) layer.toolTimeoutMs = parseTimeout(timeout, "INSTALLGUARD_TOOL_TIMEOUT_MS");

  return layer;
}

export function flagLayer(args: ParsedArgs): ValidatorOptionsInput {
  const layer: ValidatorOptionsInput = {};
  const bool = (name: string): boolean | undefined => {
    const v = flagValue(args, name);
    return v === undefined ? undefined : parseBool(v, `--${name}`);
  };

  const failOnWorldWritable = bool("fail-on-world-writable");
  if (failOnWorldWritable !== undefined) layer.failOnWorldWritable = failOnWorldWritable;
  const failOnSetuid = bool("fail-on-setuid");
  if (failOnSetuid !== undefined) layer.failOnSetuid = failOnSetuid;
  const failOnSymlinkEscape = bool("fail-on-symlink-escape");
  if (failOnSymlinkEscape !== undefined) layer.failOnSymlinkEscape = failOnSymlinkEscape;
  const verbose = bool("verbose");
  if (verbose !== undefined) layer.verbose = verbose;

  const prefixes = flagValues(args, "allow-symlink-prefix");
  if (prefixes.length > 0) layer.allowedSymlinkPrefixes = prefixes;

  const recipe = flagValue(args, "recipe");
  if (recipe) layer.recipeHint = recipe;

  const timeout = flagValue(args, "timeout-ms");
  if (timeout) layer.toolTimeoutMs = parseTimeout(timeout, "--timeout-ms");

  return layer;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function resolveOptions(args: ParsedArgs, env: Env): ValidatorOptions {
  const file = configFilePath(args, env);
  const merged: ValidatorOptionsInput = {
    ...(file !== undefined ? loadConfigFile(file) : {}),
    ...envLayer(env),
    ...flagLayer(args),
  };

  try {
    return defineOptions(merged);
  } catch (e: unknown) {
    if (e instanceof ZodError) {
      throw new ValidationError(`Invalid options: ${formatZodError(e)}`, "CONFIG_INVALID");
    }
    throw e;
  }
}

export function trustedIdFilePath(args: ParsedArgs, env: Env): string | undefined {
  return flagValue(args, "ids") ?? env["INSTALLGUARD_ID_FILE"];
}
