/**
 * Permission scanner: setuid, setgid and world-writable entries.
 *
 * Every regular file and directory below the root is classified from its
 * own lstat mode; one entry can land in several categories. Symlinks are
 * not classified because the OS ignores their mode bits.
 */

import { walkTree } from "./walk.js";
import type { PermissionFinding } from "./findings.js";
import { fail, pass, describeError, type CheckResult } from "../pipeline/errors.js";

export interface PermissionScanOptions {
  failOnWorldWritable: boolean;
  failOnSetuid: boolean;
}

export interface PermissionScanResult {
  findings: PermissionFinding[];
  counts: { setuid: number; setgid: number; worldWritable: number };
}

const S_ISUID = 0o4000;
const S_ISGID = 0o2000;
const S_IWOTH = 0o0002;

export function classifyMode(mode: number): PermissionFinding["kind"][] {
  const kinds: PermissionFinding["kind"][] = [];
  if (mode & S_ISUID) kinds.push("setuid");
  if (mode & S_ISGID) kinds.push("setgid");
  if (mode & S_IWOTH) kinds.push("world-writable");
  return kinds;
}

export function scanPermissions(
  root: string,
  options: PermissionScanOptions,
): CheckResult<PermissionScanResult> {
  const findings: PermissionFinding[] = [];

  try {
    for (const entry of walkTree(root)) {
      if (!entry.stats.isFile() && !entry.stats.isDirectory()) continue;
      for (const kind of classifyMode(entry.stats.mode)) {
        findings.push({ kind, path: entry.path });
      }
    }
  } catch (e: unknown) {
    return fail("TREE_UNREADABLE", `Cannot scan ${root}: ${describeError(e)}`, root);
  }

  const setuid = findings.filter((f) => f.kind === "setuid");
  const setgid = findings.filter((f) => f.kind === "setgid");
  const world = findings.filter((f) => f.kind === "world-writable");

  const firstPrivileged = setuid[0] ?? setgid[0];
  if (options.failOnSetuid && firstPrivileged) {
    return fail(
      "DANGEROUS_PERMISSIONS",
      `Setuid/setgid file found: ${firstPrivileged.path}`,
      firstPrivileged.path,
      firstPrivileged.kind,
    );
  }

  const firstWorld = world[0];
  if (options.failOnWorldWritable && firstWorld) {
    return fail(
      "DANGEROUS_PERMISSIONS",
      `World-writable file found: ${firstWorld.path}`,
      firstWorld.path,
      firstWorld.kind,
    );
  }

  return pass({
    findings,
    counts: {
      setuid: setuid.length,
      setgid: setgid.length,
      worldWritable: world.length,
    },
  });
}
