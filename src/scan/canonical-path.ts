/**
 * Path canonicalization for containment checks.
 *
 * canonicalize() never throws: a path that cannot be resolved (broken link,
 * loop, permission denied) maps to UNRESOLVABLE, which isWithin() treats as
 * outside every prefix.
 */

import { realpathSync } from "node:fs";
import { sep } from "node:path";

export const UNRESOLVABLE = "unresolvable";

export function canonicalize(path: string): string {
  try {
    return realpathSync.native(path);
  } catch {
    return UNRESOLVABLE;
  }
}

/**
 * Segment-aware prefix test: `/a/b/c` is within `/a/b`, `/a/bcd` is not.
 */
export function isWithin(candidate: string, prefix: string): boolean {
  if (candidate === UNRESOLVABLE || prefix === UNRESOLVABLE) return false;
  if (candidate === prefix) return true;
  const base = prefix.endsWith(sep) ? prefix : prefix + sep;
  return candidate.startsWith(base);
}
