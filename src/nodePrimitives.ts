import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Environment map handed to spawned interpreters. */
export type ProcessEnv = typeof process.env;

/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * inspected by the bridge are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an errno error carrying the provided code. */
export function hasErrnoCode(error: unknown, code: string): error is ErrnoException {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Renders any thrown value as a message suitable for logs and envelopes. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
