/**
 * Component signature traversal for application bundles.
 *
 * Walks the bundle top-down. A subdirectory named like a nested bundle
 * (.framework, .appex, .plugin, .bundle) is inspected as one unit and its
 * path joins the `verified` set; the walk's prune hook consults that set,
 * so nothing inside a verified bundle is ever re-inspected as a loose file.
 * Loose regular files are inspected only if they carry a Mach-O header.
 * Reserved metadata directories are never entered.
 *
 * The first inspection failure or untrusted identity ends the traversal.
 */

import { walkTree, type WalkEntry } from "../scan/walk.js";
import { isNativeBinary } from "./native-binary.js";
import { describeIdentity, verifyIdentity, type TrustedIdentitySet } from "./identity.js";
import type { SignatureInspector } from "../tools/collaborators.js";
import { fail, pass, describeError, type CheckResult } from "../pipeline/errors.js";

export const RESERVED_DIRS: ReadonlySet<string> = new Set([
  "_CodeSignature",
  "_MASReceipt",
  "Resources",
]);

export const BUNDLE_SUFFIXES: readonly string[] = [
  ".framework",
  ".appex",
  ".plugin",
  ".bundle",
];

export type ComponentKind = "bundle" | "binary";

export interface VerifiedComponent {
  path: string;
  kind: ComponentKind;
  teamId: string;
}

export interface ComponentScanResult {
  components: VerifiedComponent[];
}

export interface ComponentScanOptions {
  onComponent?: (component: VerifiedComponent) => void;
}

function classify(entry: WalkEntry): ComponentKind | undefined {
  if (entry.stats.isDirectory()) {
    return BUNDLE_SUFFIXES.some((s) => entry.name.endsWith(s)) ? "bundle" : undefined;
  }
  // Symlinks are never binaries: the real file is reached on its own path.
  if (entry.stats.isFile() && isNativeBinary(entry.path)) return "binary";
  return undefined;
}

async function verifyComponent(
  path: string,
  kind: ComponentKind,
  trustedIds: TrustedIdentitySet,
  inspector: SignatureInspector,
): Promise<CheckResult<VerifiedComponent>> {
  const outcome = await inspector.inspectComponent(path);
  if (outcome.kind === "timeout") {
    return fail(
      "EXTERNAL_TOOL_TIMEOUT",
      `Signature inspection timed out after ${outcome.timeoutMs} ms: ${path}`,
      path,
      outcome.command,
    );
  }
  if (outcome.exitCode !== 0) {
    return fail(
      "SIGNATURE_INSPECTION_FAILED",
      `Signature inspection failed (exit ${outcome.exitCode}): ${path}`,
      path,
      outcome.stderr.trim(),
    );
  }

  const check = verifyIdentity(outcome.stdout, "component", path, trustedIds);
  if (!check.trusted || check.identity.teamId === null) {
    const label = kind === "bundle" ? "Untrusted Team ID in" : "Untrusted native binary:";
    return fail(
      "UNTRUSTED_COMPONENT_IDENTITY",
      `${label} ${path} (team ID: ${describeIdentity(check)})`,
      path,
      describeIdentity(check),
    );
  }
  return pass({ path, kind, teamId: check.identity.teamId });
}

export async function scanComponents(
  appRoot: string,
  trustedIds: TrustedIdentitySet,
  inspector: SignatureInspector,
  options: ComponentScanOptions = {},
): Promise<CheckResult<ComponentScanResult>> {
  const verified = new Set<string>();
  const components: VerifiedComponent[] = [];

  const walk = walkTree(appRoot, {
    prune: (entry) => RESERVED_DIRS.has(entry.name) || verified.has(entry.path),
  });

  for (;;) {
    let entry: WalkEntry;
    let kind: ComponentKind | undefined;
    try {
      const next = walk.next();
      if (next.done === true) break;
      entry = next.value;
      kind = classify(entry);
    } catch (e: unknown) {
      return fail("TREE_UNREADABLE", `Cannot scan ${appRoot}: ${describeError(e)}`, appRoot);
    }
    if (kind === undefined) continue;

    const result = await verifyComponent(entry.path, kind, trustedIds, inspector);
    if (!result.ok) return result;
    if (kind === "bundle") verified.add(entry.path);
    components.push(result.value);
    options.onComponent?.(result.value);
  }

  return pass({ components });
}
