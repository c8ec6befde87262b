/**
 * Shared fixtures: bundle trees on disk and in-process fakes for the
 * OS tool collaborators.
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type {
  AssessmentKind,
  Collaborators,
  DiskImageMounter,
  MountOutcome,
  NotarizationAssessor,
  SignatureInspector,
} from "../../src/tools/collaborators.js";
import type { ToolOutcome } from "../../src/tools/run-tool.js";

export const TRUSTED = "ABCDE12345";
export const OTHER_TRUSTED = "FGHIJ67890";
export const UNTRUSTED = "ZZZZZ99999";

// 64-bit little-endian Mach-O header start.
export const MACHO_BYTES = Uint8Array.from([0xcf, 0xfa, 0xed, 0xfe, 0x07, 0x00, 0x00, 0x01]);

export function makeDir(path: string): string {
  mkdirSync(path, { recursive: true, mode: 0o755 });
  return path;
}

export function writeText(path: string, content = "data\n"): string {
  makeDir(dirname(path));
  writeFileSync(path, content, { mode: 0o644 });
  return path;
}

export function writeBinary(path: string): string {
  makeDir(dirname(path));
  writeFileSync(path, MACHO_BYTES, { mode: 0o755 });
  return path;
}

export function link(target: string, path: string): string {
  makeDir(dirname(path));
  symlinkSync(target, path);
  return path;
}

/** Minimal app: Contents/Info.plist and one main executable. */
export function makeApp(parent: string, name = "Example.app"): { app: string; main: string } {
  const app = makeDir(join(parent, name));
  writeText(join(app, "Contents", "Info.plist"), "<plist/>\n");
  const main = writeBinary(join(app, "Contents", "MacOS", "Example"));
  return { app, main };
}

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function exited(stdout: string, exitCode = 0, stderr = ""): ToolOutcome {
  return { kind: "exited", exitCode, stdout, stderr };
}

export function componentText(teamId: string | null): string {
  return [
    "Executable=/fixture",
    "Format=Mach-O thin (arm64)",
    `TeamIdentifier=${teamId ?? "not set"}`,
    "",
  ].join("\n");
}

export function packageText(teamId: string): string {
  return [
    "Package \"Example.pkg\":",
    "   Status: signed by a developer certificate issued by Apple for distribution",
    "   Certificate Chain:",
    `    1. Developer ID Installer: Example Corp (${teamId})`,
    "    2. Developer ID Certification Authority",
    "    3. Apple Root CA",
    "",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

export class FakeAssessor implements NotarizationAssessor {
  readonly calls: { path: string; kind: AssessmentKind }[] = [];
  outcome: ToolOutcome = exited("", 0, "accepted\nsource=Notarized Developer ID\n");

  async assess(path: string, kind: AssessmentKind): Promise<ToolOutcome> {
    this.calls.push({ path, kind });
    return this.outcome;
  }
}

export class FakeInspector implements SignatureInspector {
  readonly inspected: string[] = [];
  readonly components = new Map<string, ToolOutcome>();
  defaultTeam: string | null = TRUSTED;
  packageOutcome: ToolOutcome = exited(packageText(TRUSTED));
  failWith?: Error;

  async inspectPackage(path: string): Promise<ToolOutcome> {
    this.inspected.push(path);
    return this.packageOutcome;
  }

  async inspectComponent(path: string): Promise<ToolOutcome> {
    if (this.failWith) throw this.failWith;
    this.inspected.push(path);
    return this.components.get(path) ?? exited(componentText(this.defaultTeam));
  }

  team(path: string, teamId: string | null): this {
    this.components.set(path, exited(componentText(teamId)));
    return this;
  }
}

export class FakeMounter implements DiskImageMounter {
  readonly attached: string[] = [];
  readonly detached: string[] = [];
  attachOutcome?: MountOutcome;
  detachError?: Error;

  constructor(
    private readonly parent: string,
    private readonly populate: (mountPoint: string) => void = () => undefined,
  ) {}

  async attach(imagePath: string): Promise<MountOutcome> {
    if (this.attachOutcome) return this.attachOutcome;
    const mountPoint = mkdtempSync(join(this.parent, "mnt-"));
    this.populate(mountPoint);
    this.attached.push(imagePath);
    return { kind: "mounted", mountPoint };
  }

  async detach(mountPoint: string): Promise<void> {
    if (this.detachError) throw this.detachError;
    this.detached.push(mountPoint);
    rmSync(mountPoint, { recursive: true, force: true });
  }
}

export interface FakeTools extends Collaborators {
  assessor: FakeAssessor;
  inspector: FakeInspector;
  mounter: FakeMounter;
}

export function fakeTools(
  mountParent: string,
  populate?: (mountPoint: string) => void,
): FakeTools {
  return {
    assessor: new FakeAssessor(),
    inspector: new FakeInspector(),
    mounter: new FakeMounter(mountParent, populate),
  };
}
