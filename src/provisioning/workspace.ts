import { randomUUID } from "node:crypto";
import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { sanitizeFilename } from "../paths.js";

/**
 * Local directory holding one session's source tree. `root` is the directory
 * owned by the session and removed on teardown; `path` is `root/repo`.
 */
export interface Workspace {
  readonly name: string;
  readonly root: string;
  readonly path: string;
}

/** Name of the directory the archive's top-level folder is renamed to. */
export const REPOSITORY_DIRNAME = "repo";

/**
 * Creates a fresh, uniquely named workspace root under {@link workspaceRoot}.
 * The repository directory itself is not created.
 */
export async function allocateWorkspace(workspaceRoot: string, name: string): Promise<Workspace> {
  const suffix = randomUUID().replace(/-/g, "").slice(0, 12);
  const root = path.join(path.resolve(workspaceRoot), `ws_${sanitizeFilename(name)}_${suffix}`);
  await mkdir(root, { recursive: true });
  return { name, root, path: path.join(root, REPOSITORY_DIRNAME) };
}

/** Removes the workspace root recursively. Missing directories are ignored. */
export async function removeWorkspace(workspace: Workspace): Promise<void> {
  await rm(workspace.root, { recursive: true, force: true });
}
