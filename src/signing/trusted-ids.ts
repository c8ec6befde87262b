/**
 * Trusted team identifier list.
 *
 * Format: one identifier per line. Anything after "#" is a comment, blank
 * lines are ignored, whitespace is trimmed.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { TEAM_ID_RE, type TrustedIdentitySet } from "./identity.js";
import { ValidationError } from "../pipeline/errors.js";
import { expandHome } from "../target/resolve.js";

const TeamIdSchema = z
  .string()
  .regex(TEAM_ID_RE, "Team identifier must be exactly 10 characters A-Z or 0-9");

export interface TrustedIdEntry {
  line: number;
  teamId: string;
}

export function parseTrustedIds(content: string, source = "<input>"): TrustedIdEntry[] {
  const entries: TrustedIdEntry[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const value = (raw.split("#")[0] ?? "").trim();
    if (value === "") return;
    const parsed = TeamIdSchema.safeParse(value);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new ValidationError(
        `${source}:${index + 1}: invalid team identifier "${value}": ${reason}`,
        "CONFIG_INVALID",
        { source, line: index + 1, value },
      );
    }
    entries.push({ line: index + 1, teamId: parsed.data });
  });

  return entries;
}

export function toTrustedSet(entries: readonly TrustedIdEntry[]): TrustedIdentitySet {
  return new Set(entries.map((e) => e.teamId));
}

export function loadTrustedIds(filePath: string): TrustedIdentitySet {
  const abs = expandHome(filePath);
  if (!existsSync(abs)) {
    throw new ValidationError(`Trusted ID file not found: ${abs}`, "CONFIG_INVALID", {
      path: abs,
    });
  }
  const entries = parseTrustedIds(readFileSync(abs, "utf8"), abs);
  if (entries.length === 0) {
    throw new ValidationError(`Trusted ID file has no entries: ${abs}`, "CONFIG_INVALID", {
      path: abs,
    });
  }
  return toTrustedSet(entries);
}
