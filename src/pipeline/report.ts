/**
 * Validation report: the single result of a run.
 *
 * `verdictHash` covers only the run-independent part (no run ID, no
 * timestamps): validating the same unmodified artifact twice yields the
 * same hash.
 */

import { v4 as uuidv4 } from "uuid";
import { canonicalJson, sha256Hex } from "./canonical.js";
import type { ValidationFailure } from "./errors.js";
import type { ScanFinding } from "../scan/findings.js";
import type { VerifiedComponent } from "../signing/bundle-traversal.js";
import type { ValidationTarget } from "../target/resolve.js";

export const REPORT_SCHEMA_VERSION = "1.0.0";

export type PipelineStage =
  | "resolved"
  | "mounted"
  | "assessed"
  | "team-id-checked"
  | "deep-scanned"
  | "cleaned-up"
  | "passed"
  | "failed";

export interface ValidationReport {
  schemaVersion: typeof REPORT_SCHEMA_VERSION;
  runId: string;
  startedAt: string;
  finishedAt: string;
  inputPath: string;
  /** The artifact finally inspected (the .app inside a mounted image). */
  target?: ValidationTarget;
  /** The resolved artifact before any mount. */
  artifact?: ValidationTarget;
  passed: boolean;
  failure?: ValidationFailure;
  stages: PipelineStage[];
  warnings: string[];
  findings: ScanFinding[];
  components: VerifiedComponent[];
  packageTeamId?: string;
  verdictHash: string;
}

export type DraftReport = Omit<ValidationReport, "finishedAt" | "verdictHash">;

export function createReport(inputPath: string, now: Date = new Date()): DraftReport {
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    runId: uuidv4(),
    startedAt: now.toISOString(),
    inputPath,
    passed: false,
    stages: [],
    warnings: [],
    findings: [],
    components: [],
  };
}

/**
 * Mount points are temporary directories with random names; paths below
 * one are reported relative to a stable placeholder for hashing.
 */
export function computeVerdictHash(report: DraftReport, mountPoint?: string): string {
  const stable = {
    artifact: report.artifact,
    target: report.target,
    passed: report.passed,
    failure: report.failure,
    stages: report.stages,
    warnings: report.warnings,
    findings: report.findings,
    components: report.components,
    packageTeamId: report.packageTeamId,
  };
  let canonical = canonicalJson(stable);
  if (mountPoint !== undefined) {
    canonical = canonical.split(mountPoint).join("<mount>");
  }
  return sha256Hex(canonical);
}

export function finalizeReport(
  report: DraftReport,
  mountPoint?: string,
  now: Date = new Date(),
): ValidationReport {
  return {
    ...report,
    finishedAt: now.toISOString(),
    verdictHash: computeVerdictHash(report, mountPoint),
  };
}
