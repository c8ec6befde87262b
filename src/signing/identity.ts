/**
 * Team identifier extraction and trust decision.
 *
 * Package signatures name the installer certificate,
 *   "Developer ID Installer: Example Corp (ABCDE12345)"
 * while component signatures carry a key-value line,
 *   "TeamIdentifier=ABCDE12345".
 */

export type SignatureSource = "package" | "component";

export type TrustedIdentitySet = ReadonlySet<string>;

export interface SigningIdentity {
  path: string;
  teamId: string | null;
}

export interface IdentityCheck {
  trusted: boolean;
  identity: SigningIdentity;
  /** Every distinct identifier seen, for diagnostics. */
  candidates: string[];
}

export const TEAM_ID_RE = /^[A-Z0-9]{10}$/;

const PATTERNS: Record<SignatureSource, RegExp> = {
  package: /Developer ID Installer: .*\(([A-Z0-9]{10})\)/g,
  component: /TeamIdentifier=([A-Z0-9]{10})(?![A-Za-z0-9])/g,
};

export function extractTeamIds(text: string, source: SignatureSource): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(PATTERNS[source])) {
    const id = match[1];
    if (id !== undefined) seen.add(id);
  }
  return [...seen];
}

/**
 * Exactly one distinct identifier must be present and it must be an exact
 * member of the trusted set.
 */
export function verifyIdentity(
  text: string,
  source: SignatureSource,
  path: string,
  trustedIds: TrustedIdentitySet,
): IdentityCheck {
  const candidates = extractTeamIds(text, source);
  const only = candidates.length === 1 ? candidates[0] : undefined;
  const teamId = only ?? null;
  return {
    trusted: only !== undefined && trustedIds.has(only),
    identity: { path, teamId },
    candidates,
  };
}

export function describeIdentity(check: IdentityCheck): string {
  if (check.candidates.length === 0) return "none";
  return check.candidates.join(", ");
}
