import { stat } from 'node:fs/promises';
import path from 'node:path';
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { hasErrnoCode } from './nodePrimitives.js';

/** Maximum number of characters preserved in a sanitised filename. */
const MAX_FILENAME_LENGTH = 64;

/**
 * Raised when a path derived from untrusted input (an archive entry, a
 * descriptor entrypoint) would land outside the directory it belongs to.
 */
export class PathResolutionError extends Error {
  /** Absolute path that the caller attempted to access. */
  public readonly attemptedPath: string;
  /** Base directory configured for the operation. */
  public readonly rootDirectory: string;
  public readonly details: { attemptedPath: string; rootDirectory: string; relative?: string };

  constructor(message: string, attemptedPath: string, rootDirectory: string, extras: { relative?: string } = {}) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
    this.details = { attemptedPath, rootDirectory, ...extras };
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError('path escapes base directory', targetPath, absoluteRoot, { relative });
  }

  return targetPath;
}

/** Resolves to `true` when {@link filePath} exists and is a regular file. */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (hasErrnoCode(error, 'ENOENT') || hasErrnoCode(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Sanitises a server name so it can be embedded in a directory name.
 *
 * Path separators, control characters and whitespace are replaced by
 * underscores; an empty result falls back to a neutral placeholder.
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return 'unnamed';
  }

  const removedControlCharacters = trimmed.normalize('NFC').replace(/[\0-\x1F\x7F]/g, '');
  const withoutTraversal = removedControlCharacters.replace(/\.\./g, '');

  const basicSanitised = withoutTraversal
    .replace(/[\\/]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}._-]+/gu, '_');

  const trimmedUnderscores = basicSanitised.replace(/_+/g, '_').replace(/^_+|_+$/g, '');
  const limited = trimmedUnderscores.slice(0, MAX_FILENAME_LENGTH);

  return limited.length > 0 ? limited : 'unnamed';
}
