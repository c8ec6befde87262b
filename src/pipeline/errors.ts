/**
 * Validation error taxonomy.
 *
 * Fixed codes. Checks report failures as values
 * (CheckResult); only configuration loading throws ValidationError.
 */

export type ValidationErrorCode =
  | "TARGET_RESOLUTION_FAILED"
  | "MOUNT_FAILED"
  | "NO_APPLICATION_IN_IMAGE"
  | "ASSESSMENT_FAILED"
  | "UNTRUSTED_PACKAGE_IDENTITY"
  | "DANGEROUS_PERMISSIONS"
  | "SYMLINK_ESCAPE"
  | "SIGNATURE_INSPECTION_FAILED"
  | "UNTRUSTED_COMPONENT_IDENTITY"
  | "EXTERNAL_TOOL_TIMEOUT"
  | "TREE_UNREADABLE"
  | "CONFIG_INVALID";

export interface ValidationFailure {
  code: ValidationErrorCode;
  message: string;
  path?: string;
  detail?: string;
}

export type CheckResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ValidationFailure };

export function pass<T>(value: T): CheckResult<T> {
  return { ok: true, value };
}

export function fail<T>(
  code: ValidationErrorCode,
  message: string,
  path?: string,
  detail?: string,
): CheckResult<T> {
  const failure: ValidationFailure = { code, message };
  if (path !== undefined) failure.path = path;
  if (detail !== undefined) failure.detail = detail;
  return { ok: false, failure };
}

export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ValidationErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
    this.details = details ?? {};
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
