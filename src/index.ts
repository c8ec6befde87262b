export { ValidationPipeline, findApplication, type ValidationRequest } from "./pipeline/pipeline.js";
export {
  ValidationError,
  type CheckResult,
  type ValidationErrorCode,
  type ValidationFailure,
} from "./pipeline/errors.js";
export { defineOptions, type ValidatorOptions } from "./pipeline/options.js";
export { createStreamLog, MemoryLog, type ValidationLog } from "./pipeline/log.js";
export type { ValidationReport, PipelineStage } from "./pipeline/report.js";
export { canonicalize, isWithin, UNRESOLVABLE } from "./scan/canonical-path.js";
export { scanPermissions } from "./scan/permissions.js";
export { detectSymlinkEscapes } from "./scan/symlinks.js";
export type { ScanFinding } from "./scan/findings.js";
export { scanComponents, type VerifiedComponent } from "./signing/bundle-traversal.js";
export { verifyIdentity, extractTeamIds, type TrustedIdentitySet } from "./signing/identity.js";
export { loadTrustedIds, parseTrustedIds } from "./signing/trusted-ids.js";
export { resolveTarget, type ValidationTarget, type TargetKind } from "./target/resolve.js";
export type { Collaborators } from "./tools/collaborators.js";
export { createMacCollaborators } from "./tools/macos.js";
