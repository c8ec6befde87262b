/**
 * Seams to the operating system's security tooling.
 *
 * The validation engine only talks to these interfaces; src/tools/macos.ts
 * binds them to spctl, pkgutil, codesign and hdiutil.
 */

import type { ToolOutcome } from "./run-tool.js";

export type AssessmentKind = "install" | "execute";

export interface NotarizationAssessor {
  assess(path: string, kind: AssessmentKind): Promise<ToolOutcome>;
}

/**
 * Returns the raw diagnostic text in `stdout` regardless of which stream
 * the underlying tool writes it to.
 */
export interface SignatureInspector {
  inspectPackage(path: string): Promise<ToolOutcome>;
  inspectComponent(path: string): Promise<ToolOutcome>;
}

export type MountOutcome =
  | { kind: "mounted"; mountPoint: string }
  | { kind: "failed"; detail: string }
  // `cleanup` is set when the detach after a timed-out attach failed too;
  // the mount point is then left in place.
  | { kind: "timeout"; command: string; timeoutMs: number; cleanup?: string };

export interface DiskImageMounter {
  /**
   * On failure the mounter has already removed any directory it created,
   * unless a timed-out attach could not be detached. Never rejects.
   */
  attach(imagePath: string): Promise<MountOutcome>;
  /** Detaches and removes the mount point. Rejects if the detach failed. */
  detach(mountPoint: string): Promise<void>;
}

export interface Collaborators {
  assessor: NotarizationAssessor;
  inspector: SignatureInspector;
  mounter: DiskImageMounter;
}
