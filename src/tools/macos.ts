/**
 * Collaborators backed by the macOS command-line tools.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runTool, describeCommand, type ToolOutcome, type ToolRunner } from "./run-tool.js";
import type {
  AssessmentKind,
  Collaborators,
  DiskImageMounter,
  MountOutcome,
  NotarizationAssessor,
  SignatureInspector,
} from "./collaborators.js";

export const SPCTL = "/usr/sbin/spctl";
export const PKGUTIL = "/usr/sbin/pkgutil";
export const CODESIGN = "/usr/bin/codesign";
export const HDIUTIL = "/usr/bin/hdiutil";

export const MOUNT_PREFIX = "installguard-dmg-";

export interface MacToolOptions {
  timeoutMs: number;
  run?: ToolRunner;
  /** Parent directory for temporary mount points. */
  mountParent?: string;
}

export class SpctlAssessor implements NotarizationAssessor {
  constructor(private readonly options: MacToolOptions) {}

  assess(path: string, kind: AssessmentKind): Promise<ToolOutcome> {
    const run = this.options.run ?? runTool;
    return run(SPCTL, ["--assess", "--type", kind, "-vv", path], {
      timeoutMs: this.options.timeoutMs,
    });
  }
}

export class CodesignInspector implements SignatureInspector {
  constructor(private readonly options: MacToolOptions) {}

  inspectPackage(path: string): Promise<ToolOutcome> {
    const run = this.options.run ?? runTool;
    return run(PKGUTIL, ["--check-signature", path], {
      timeoutMs: this.options.timeoutMs,
    });
  }

  async inspectComponent(path: string): Promise<ToolOutcome> {
    const run = this.options.run ?? runTool;
    const outcome = await run(CODESIGN, ["-dv", path], {
      timeoutMs: this.options.timeoutMs,
    });
    // codesign -d writes its report to stderr.
    if (outcome.kind !== "exited") return outcome;
    return { ...outcome, stdout: outcome.stderr };
  }
}

export class HdiutilMounter implements DiskImageMounter {
  constructor(private readonly options: MacToolOptions) {}

  async attach(imagePath: string): Promise<MountOutcome> {
    const run = this.options.run ?? runTool;
    const mountPoint = mkdtempSync(join(this.options.mountParent ?? tmpdir(), MOUNT_PREFIX));
    const args = [
      "attach",
      imagePath,
      "-readonly",
      "-nobrowse",
      "-quiet",
      "-mountpoint",
      mountPoint,
    ];
    const outcome = await run(HDIUTIL, args, { timeoutMs: this.options.timeoutMs });

    if (outcome.kind === "exited" && outcome.exitCode === 0) {
      return { kind: "mounted", mountPoint };
    }

    if (outcome.kind === "timeout") {
      // A timed-out attach may still complete; the directory goes only once detached.
      const problem = await this.release(mountPoint);
      return problem === undefined ? outcome : { ...outcome, cleanup: problem };
    }

    rmSync(mountPoint, { recursive: true, force: true });
    return {
      kind: "failed",
      detail: `${describeCommand(HDIUTIL, args)} exited ${outcome.exitCode}: ${outcome.stderr.trim()}`,
    };
  }

  async detach(mountPoint: string): Promise<void> {
    const problem = await this.release(mountPoint);
    if (problem !== undefined) throw new Error(problem);
  }

  /** Detaches, then removes the mount point. Returns why it could not. */
  private async release(mountPoint: string): Promise<string | undefined> {
    const run = this.options.run ?? runTool;
    const outcome = await run(HDIUTIL, ["detach", mountPoint, "-force", "-quiet"], {
      timeoutMs: this.options.timeoutMs,
    });
    if (outcome.kind === "timeout") {
      return `hdiutil detach timed out after ${outcome.timeoutMs} ms: ${mountPoint}`;
    }
    if (outcome.exitCode !== 0) {
      return `hdiutil detach exited ${outcome.exitCode} for ${mountPoint}: ${outcome.stderr.trim()}`;
    }
    rmSync(mountPoint, { recursive: true, force: true });
    return undefined;
  }
}

export function createMacCollaborators(options: MacToolOptions): Collaborators {
  return {
    assessor: new SpctlAssessor(options),
    inspector: new CodesignInspector(options),
    mounter: new HdiutilMounter(options),
  };
}
