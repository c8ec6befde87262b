/**
 * Validator options: one immutable object per run.
 */

import { z } from "zod";

export const DEFAULT_TOOL_TIMEOUT_MS = 300_000;

export const ValidatorOptionsSchema = z
  .object({
    failOnWorldWritable: z.boolean().default(true),
    failOnSetuid: z.boolean().default(true),
    failOnSymlinkEscape: z.boolean().default(true),
    verbose: z.boolean().default(false),
    allowedSymlinkPrefixes: z.array(z.string().min(1)).default([]),
    recipeHint: z.string().min(1).optional(),
    toolTimeoutMs: z.number().int().min(0).max(86_400_000).default(DEFAULT_TOOL_TIMEOUT_MS),
  })
  .strict();

export type ValidatorOptionsInput = z.input<typeof ValidatorOptionsSchema>;

export type ValidatorOptions = Readonly<
  Omit<z.output<typeof ValidatorOptionsSchema>, "allowedSymlinkPrefixes"> & {
    allowedSymlinkPrefixes: readonly string[];
  }
>;

export function defineOptions(input: ValidatorOptionsInput = {}): ValidatorOptions {
  const parsed = ValidatorOptionsSchema.parse(input);
  return Object.freeze({
    ...parsed,
    allowedSymlinkPrefixes: Object.freeze([...parsed.allowedSymlinkPrefixes]),
  });
}
