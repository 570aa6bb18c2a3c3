import { z } from "zod";

import { parseBoolLiteral } from "../config/env.js";
import { DEFAULT_ENTRYPOINT, DEFAULT_LANGUAGE, type Descriptor } from "../descriptors/descriptor.js";
import { fail, succeed, type Outcome } from "./errors.js";

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .optional();

/** Query parameters accepted by both transports. */
export const ConnectionParamsSchema = z.object({
  name: optionalText,
  test_mode: z
    .string()
    .optional()
    .transform((value) => parseBoolLiteral(value) ?? false),
  repo_url: optionalText,
  entrypoint: optionalText.transform((value) => value ?? DEFAULT_ENTRYPOINT),
  lang: optionalText.transform((value) => value ?? DEFAULT_LANGUAGE),
});

/** Connection-level parameters kept for the lifetime of a connection. */
export interface ConnectionParams {
  readonly name: string | undefined;
  readonly testMode: boolean;
  readonly repoUrl: string | undefined;
  readonly entrypoint: string;
  readonly lang: string;
}

/**
 * Parses parameters from a query string. Repeated keys keep their first
 * value. `URLSearchParams` already percent-decodes `repo_url`.
 */
export function parseConnectionParams(search: URLSearchParams | string): Outcome<ConnectionParams> {
  const params = typeof search === "string" ? new URLSearchParams(search) : search;
  const raw: Record<string, string> = {};
  for (const [key, value] of params) {
    if (!(key in raw)) {
      raw[key] = value;
    }
  }

  const parsed = ConnectionParamsSchema.safeParse(raw);
  if (!parsed.success) {
    return fail("InvalidRequest", "Malformed connection parameters", {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }

  return succeed({
    name: parsed.data.name,
    testMode: parsed.data.test_mode,
    repoUrl: parsed.data.repo_url,
    entrypoint: parsed.data.entrypoint,
    lang: parsed.data.lang,
  });
}

/**
 * Descriptor built directly from the parameters when `test_mode` is enabled
 * and a `repo_url` is supplied; `null` otherwise.
 */
export function descriptorOverride(params: ConnectionParams): Descriptor | null {
  if (!params.testMode || params.repoUrl === undefined) {
    return null;
  }
  return {
    repositoryLocation: params.repoUrl,
    entrypointPath: params.entrypoint,
    language: params.lang,
  };
}
