/**
 * Symlink escape detection.
 *
 * A link escapes when its fully resolved target lies outside the resolved
 * bundle root and outside every allowed prefix. Unresolvable links escape.
 */

import { walkTree } from "./walk.js";
import { canonicalize, isWithin, UNRESOLVABLE } from "./canonical-path.js";
import type { SymlinkFinding } from "./findings.js";
import { fail, pass, describeError, type CheckResult } from "../pipeline/errors.js";

export interface SymlinkScanOptions {
  failOnEscape: boolean;
  allowedPrefixes: readonly string[];
  /** Called for every link examined, escaping or not. */
  onLink?: (path: string, resolvedTarget: string) => void;
}

export function detectSymlinkEscapes(
  bundleRoot: string,
  options: SymlinkScanOptions,
): CheckResult<SymlinkFinding[]> {
  const realRoot = canonicalize(bundleRoot);
  if (realRoot === UNRESOLVABLE) {
    return fail("TREE_UNREADABLE", `Cannot resolve bundle root: ${bundleRoot}`, bundleRoot);
  }
  const realPrefixes = options.allowedPrefixes
    .map(canonicalize)
    .filter((p) => p !== UNRESOLVABLE);

  const findings: SymlinkFinding[] = [];

  try {
    for (const entry of walkTree(bundleRoot)) {
      if (!entry.stats.isSymbolicLink()) continue;

      const target = canonicalize(entry.path);
      options.onLink?.(entry.path, target);

      const contained =
        isWithin(target, realRoot) ||
        realPrefixes.some((prefix) => isWithin(target, prefix));
      if (contained) continue;

      if (options.failOnEscape) {
        return fail(
          "SYMLINK_ESCAPE",
          `Symlink escape: ${entry.path} -> ${target}`,
          entry.path,
          target,
        );
      }
      findings.push({ kind: "symlink-escape", path: entry.path, resolvedTarget: target });
    }
  } catch (e: unknown) {
    return fail("TREE_UNREADABLE", `Cannot scan ${bundleRoot}: ${describeError(e)}`, bundleRoot);
  }

  return pass(findings);
}
