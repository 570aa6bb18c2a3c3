import { z } from "zod";

import { fail, succeed, type Outcome } from "../bridge/errors.js";

/** Resolved deployment metadata for a named server. */
export interface Descriptor {
  readonly repositoryLocation: string;
  readonly entrypointPath: string;
  readonly language: string;
}

export const DEFAULT_ENTRYPOINT = "main.py";
export const DEFAULT_LANGUAGE = "python";

/**
 * Stored document shape. Unknown keys are tolerated so registries can carry
 * extra metadata without breaking resolution.
 */
export const StoredDescriptorSchema = z
  .object({
    repository: z.object({ url: z.string().trim().url() }).passthrough(),
    entrypoint: z.string().trim().min(1),
    lang: z.string().trim().min(1),
  })
  .passthrough();

/** Parses and validates a stored descriptor document. */
export function parseStoredDescriptor(name: string, raw: string): Outcome<Descriptor> {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    return fail("StoreError", `Descriptor for ${name} is not valid JSON`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = StoredDescriptorSchema.safeParse(document);
  if (!parsed.success) {
    return fail("StoreError", `Descriptor for ${name} is malformed`, {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }

  return succeed({
    repositoryLocation: parsed.data.repository.url,
    entrypointPath: parsed.data.entrypoint,
    language: parsed.data.lang,
  });
}
