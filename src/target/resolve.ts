/**
 * Target resolution: which artifact to validate, and what kind it is.
 */

import { existsSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { basename, extname, join, resolve } from "node:path";
import { sortedNames } from "../scan/walk.js";
import { fail, pass, type CheckResult } from "../pipeline/errors.js";

export type TargetKind = "package" | "disk-image" | "application";

export interface ValidationTarget {
  readonly path: string;
  readonly kind: TargetKind;
}

// Search order when scanning a directory for candidates.
const EXTENSIONS: ReadonlyArray<readonly [string, TargetKind]> = [
  [".pkg", "package"],
  [".dmg", "disk-image"],
  [".app", "application"],
];

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return resolve(path);
}

export function kindOf(path: string): TargetKind | undefined {
  const ext = extname(path).toLowerCase();
  return EXTENSIONS.find(([e]) => e === ext)?.[1];
}

export function resolveTarget(
  inputPath: string,
  recipeHint?: string,
): CheckResult<ValidationTarget> {
  const path = expandHome(inputPath);
  if (!existsSync(path)) {
    return fail("TARGET_RESOLUTION_FAILED", `Path does not exist: ${path}`, path);
  }

  const isDirectory = statSync(path).isDirectory();
  if (!isDirectory || kindOf(path) === "application") {
    const kind = kindOf(path);
    if (kind === undefined) {
      return fail(
        "TARGET_RESOLUTION_FAILED",
        `Unsupported artifact type (expected .pkg, .dmg or .app): ${path}`,
        path,
      );
    }
    return pass({ path, kind });
  }

  const names = sortedNames(path);
  const candidates: ValidationTarget[] = [];
  for (const [ext, kind] of EXTENSIONS) {
    for (const name of names) {
      if (name.toLowerCase().endsWith(ext)) {
        candidates.push({ path: join(path, name), kind });
      }
    }
  }

  const first = candidates[0];
  if (first === undefined) {
    return fail("TARGET_RESOLUTION_FAILED", `No installer found in ${path}`, path);
  }

  if (recipeHint) {
    const hint = recipeHint.toLowerCase();
    const hinted = candidates.find((c) => basename(c.path).toLowerCase().includes(hint));
    if (hinted) return pass(hinted);
  }
  return pass(first);
}
