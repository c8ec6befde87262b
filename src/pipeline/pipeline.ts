/**
 * Validation pipeline: sequences the checks for one artifact.
 *
 *   resolved -> (mounted, disk image) -> assessed
 *     -> (team-id-checked, package) -> (deep-scanned, application)
 *     -> (cleaned-up, if mounted) -> passed
 *
 * Any stage may end the run in `failed`; the first failure is the verdict.
 * A mount, once attached, is detached on every exit path, including thrown
 * errors. A detach failure is a warning and never replaces the verdict.
 */

import { join } from "node:path";
import { describeError, fail, pass, type CheckResult, type ValidationFailure } from "./errors.js";
import type { ValidationLog } from "./log.js";
import type { ValidatorOptions } from "./options.js";
import {
  createReport,
  finalizeReport,
  type DraftReport,
  type PipelineStage,
  type ValidationReport,
} from "./report.js";
import { scanPermissions } from "../scan/permissions.js";
import { detectSymlinkEscapes } from "../scan/symlinks.js";
import { sortedNames } from "../scan/walk.js";
import { scanComponents } from "../signing/bundle-traversal.js";
import { describeIdentity, verifyIdentity, type TrustedIdentitySet } from "../signing/identity.js";
import { resolveTarget, type ValidationTarget } from "../target/resolve.js";
import type { Collaborators } from "../tools/collaborators.js";
import type { ToolOutcome } from "../tools/run-tool.js";

export interface ValidationRequest {
  inputPath: string;
  trustedIds: TrustedIdentitySet;
}

type Stage = ValidationFailure | undefined;

export class ValidationPipeline {
  constructor(
    private readonly options: ValidatorOptions,
    private readonly tools: Collaborators,
    private readonly log: ValidationLog,
  ) {}

  async run(request: ValidationRequest): Promise<ValidationReport> {
    const report = createReport(request.inputPath);

    const resolved = resolveTarget(request.inputPath, this.options.recipeHint);
    if (!resolved.ok) return this.finish(report, resolved.failure);
    report.artifact = resolved.value;
    this.enter(report, "resolved");
    this.log.debug(`target: ${resolved.value.path} (${resolved.value.kind})`);

    if (resolved.value.kind !== "disk-image") {
      return this.finish(report, await this.inspect(report, resolved.value, request.trustedIds));
    }

    const image = resolved.value.path;
    const mount = await this.tools.mounter.attach(image);
    if (mount.kind === "timeout") {
      if (mount.cleanup !== undefined) this.warn(report, mount.cleanup);
      return this.finish(report, {
        code: "EXTERNAL_TOOL_TIMEOUT",
        message: `Mounting timed out after ${mount.timeoutMs} ms: ${image}`,
        path: image,
        detail: mount.command,
      });
    }
    if (mount.kind === "failed") {
      return this.finish(report, {
        code: "MOUNT_FAILED",
        message: `Failed to mount disk image: ${image}`,
        path: image,
        detail: mount.detail,
      });
    }

    const { mountPoint } = mount;
    this.enter(report, "mounted");
    this.log.debug(`mounted ${image} at ${mountPoint}`);

    let failure: Stage;
    try {
      const app = findApplication(image, mountPoint);
      failure = app.ok
        ? await this.inspect(report, app.value, request.trustedIds)
        : app.failure;
    } finally {
      await this.release(report, mountPoint);
    }
    return this.finish(report, failure, mountPoint);
  }

  private async inspect(
    report: DraftReport,
    target: ValidationTarget,
    trustedIds: TrustedIdentitySet,
  ): Promise<Stage> {
    report.target = target;

    const assessed = await this.assess(target);
    if (assessed) return assessed;
    this.enter(report, "assessed");
    this.log.info("Gatekeeper/Notarization: PASSED");

    if (target.kind === "package") {
      const checked = await this.checkPackageIdentity(report, target, trustedIds);
      if (checked) return checked;
      this.enter(report, "team-id-checked");
    }

    if (target.kind === "application") {
      const scanned = await this.deepScan(report, target, trustedIds);
      if (scanned) return scanned;
      this.enter(report, "deep-scanned");
    }

    return undefined;
  }

  private async assess(target: ValidationTarget): Promise<Stage> {
    const kind = target.kind === "package" ? "install" : "execute";
    const outcome = await this.tools.assessor.assess(target.path, kind);
    if (outcome.kind === "timeout") return timeoutFailure("Assessment", outcome, target.path);
    if (outcome.exitCode !== 0) {
      const diagnostic = (outcome.stderr + outcome.stdout).trim();
      return {
        code: "ASSESSMENT_FAILED",
        message: `Security assessment failed for ${target.path}: ${diagnostic}`,
        path: target.path,
        detail: diagnostic,
      };
    }
    return undefined;
  }

  private async checkPackageIdentity(
    report: DraftReport,
    target: ValidationTarget,
    trustedIds: TrustedIdentitySet,
  ): Promise<Stage> {
    const outcome = await this.tools.inspector.inspectPackage(target.path);
    if (outcome.kind === "timeout") {
      return timeoutFailure("Package signature inspection", outcome, target.path);
    }
    if (outcome.exitCode !== 0) {
      return {
        code: "SIGNATURE_INSPECTION_FAILED",
        message: `Package signature inspection failed (exit ${outcome.exitCode}): ${target.path}`,
        path: target.path,
        detail: (outcome.stderr + outcome.stdout).trim(),
      };
    }

    const check = verifyIdentity(outcome.stdout, "package", target.path, trustedIds);
    if (!check.trusted || check.identity.teamId === null) {
      return {
        code: "UNTRUSTED_PACKAGE_IDENTITY",
        message: `Untrusted PKG Team ID: ${describeIdentity(check)} (${target.path})`,
        path: target.path,
        detail: describeIdentity(check),
      };
    }

    report.packageTeamId = check.identity.teamId;
    this.log.info(`Installer Team ID: PASSED (${check.identity.teamId})`);
    return undefined;
  }

  private async deepScan(
    report: DraftReport,
    target: ValidationTarget,
    trustedIds: TrustedIdentitySet,
  ): Promise<Stage> {
    const permissions = scanPermissions(target.path, {
      failOnWorldWritable: this.options.failOnWorldWritable,
      failOnSetuid: this.options.failOnSetuid,
    });
    if (!permissions.ok) return permissions.failure;
    report.findings.push(...permissions.value.findings);
    const { setuid, setgid, worldWritable } = permissions.value.counts;
    if (permissions.value.findings.length > 0) {
      this.warn(
        report,
        `permission issues found (setuid=${setuid}, setgid=${setgid}, world-writable=${worldWritable})`,
      );
      for (const finding of permissions.value.findings) {
        this.log.debug(`${finding.kind}: ${finding.path}`);
      }
    }

    const symlinks = detectSymlinkEscapes(target.path, {
      failOnEscape: this.options.failOnSymlinkEscape,
      allowedPrefixes: this.options.allowedSymlinkPrefixes,
      onLink: (path, resolved) => this.log.debug(`symlink ${path} -> ${resolved}`),
    });
    if (!symlinks.ok) return symlinks.failure;
    report.findings.push(...symlinks.value);
    for (const escape of symlinks.value) {
      this.warn(report, `symlink escape ${escape.path} -> ${escape.resolvedTarget}`);
    }

    const components = await scanComponents(target.path, trustedIds, this.tools.inspector, {
      onComponent: (c) => this.log.debug(`verified ${c.kind} ${c.path} (${c.teamId})`),
    });
    if (!components.ok) return components.failure;
    report.components.push(...components.value.components);
    this.log.info(`Component signatures: PASSED (${components.value.components.length} verified)`);
    return undefined;
  }

  private async release(report: DraftReport, mountPoint: string): Promise<void> {
    try {
      await this.tools.mounter.detach(mountPoint);
      this.enter(report, "cleaned-up");
      this.log.debug(`detached ${mountPoint}`);
    } catch (e: unknown) {
      this.warn(report, `failed to detach ${mountPoint}: ${describeError(e)}`);
    }
  }

  private finish(report: DraftReport, failure: Stage, mountPoint?: string): ValidationReport {
    if (failure) {
      report.passed = false;
      report.failure = failure;
      this.enter(report, "failed");
    } else {
      report.passed = true;
      this.enter(report, "passed");
      this.log.info("Security validation successful.");
    }
    return finalizeReport(report, mountPoint);
  }

  private enter(report: DraftReport, stage: PipelineStage): void {
    report.stages.push(stage);
  }

  private warn(report: DraftReport, msg: string): void {
    report.warnings.push(msg);
    this.log.warn(msg);
  }
}

function timeoutFailure(
  what: string,
  outcome: Extract<ToolOutcome, { kind: "timeout" }>,
  path: string,
): ValidationFailure {
  return {
    code: "EXTERNAL_TOOL_TIMEOUT",
    message: `${what} timed out after ${outcome.timeoutMs} ms: ${path}`,
    path,
    detail: outcome.command,
  };
}

/**
 * The first `*.app` entry at the top level of a mounted image.
 */
export function findApplication(
  image: string,
  mountPoint: string,
): CheckResult<ValidationTarget> {
  let names: string[];
  try {
    names = sortedNames(mountPoint);
  } catch (e: unknown) {
    return fail("TREE_UNREADABLE", `Cannot read mounted image: ${describeError(e)}`, mountPoint);
  }
  const app = names.find((name) => name.toLowerCase().endsWith(".app"));
  if (app === undefined) {
    return fail("NO_APPLICATION_IN_IMAGE", `No .app found inside disk image: ${image}`, image);
  }
  return pass({ path: join(mountPoint, app), kind: "application" });
}
