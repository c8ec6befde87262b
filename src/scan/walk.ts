/**
 * Deterministic depth-first tree walk.
 *
 * Entries are lstat'ed, never followed: a symlink to a directory is yielded
 * as a symlink and not descended into, so link loops cannot recurse.
 * Siblings are visited in code-unit order of their names, which keeps
 * "first offending path" stable between runs.
 *
 * Read errors propagate to the caller; a walk that silently skipped an
 * unreadable directory would not be exhaustive.
 */

import { lstatSync, readdirSync, type Stats } from "node:fs";
import { join } from "node:path";

export interface WalkEntry {
  path: string;
  name: string;
  depth: number;
  stats: Stats;
}

export interface WalkOptions {
  /** Return true to yield a directory but skip its contents. */
  prune?: (entry: WalkEntry) => boolean;
}

export function sortedNames(dir: string): string[] {
  return readdirSync(dir).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function* walkTree(
  root: string,
  options: WalkOptions = {},
): Generator<WalkEntry> {
  yield* walkDir(root, 1, options);
}

function* walkDir(
  dir: string,
  depth: number,
  options: WalkOptions,
): Generator<WalkEntry> {
  for (const name of sortedNames(dir)) {
    const path = join(dir, name);
    const entry: WalkEntry = { path, name, depth, stats: lstatSync(path) };
    yield entry;
    if (entry.stats.isDirectory() && !(options.prune?.(entry) ?? false)) {
      yield* walkDir(path, depth + 1, options);
    }
  }
}
