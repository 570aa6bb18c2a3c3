import { Buffer } from "node:buffer";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import AdmZip from "adm-zip";

import { BridgeError, fail, succeed, type Outcome } from "../bridge/errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { PathResolutionError, resolveWithin } from "../paths.js";
import type { DependencyInstaller, DependencyInstallReport } from "./dependencies.js";
import { archiveUrlFor } from "./sources.js";
import { allocateWorkspace, removeWorkspace, type Workspace } from "./workspace.js";

export const DEFAULT_ARCHIVE_BRANCH = "main";
export const DEFAULT_MAX_ARCHIVE_BYTES = 100 * 1024 * 1024;

/** Contract consumed by the protocol bridge during a cold start. */
export interface WorkspaceProvisioner {
  materialize(repositoryLocation: string, name: string): Promise<Outcome<Workspace>>;
  /**
   * Best-effort: failures are reported, never returned as errors. The session
   * signal aborts when the session is torn down mid-install.
   */
  installDependencies(workspace: Workspace, signal?: AbortSignal): Promise<DependencyInstallReport>;
}

export interface ArchiveProvisionerOptions {
  /** Directory hosting every workspace root. */
  readonly workspaceRoot: string;
  readonly branch?: string;
  readonly maxArchiveBytes?: number;
  readonly installer: DependencyInstaller;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Materialises repositories by downloading their branch archive and
 * extracting it into a fresh workspace. The archive's single top-level folder
 * becomes `<root>/repo`.
 */
export class ArchiveProvisioner implements WorkspaceProvisioner {
  private readonly branch: string;
  private readonly maxArchiveBytes: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ArchiveProvisionerOptions) {
    this.branch = options.branch ?? DEFAULT_ARCHIVE_BRANCH;
    this.maxArchiveBytes = options.maxArchiveBytes ?? DEFAULT_MAX_ARCHIVE_BYTES;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async materialize(repositoryLocation: string, name: string): Promise<Outcome<Workspace>> {
    const archiveUrl = archiveUrlFor(repositoryLocation, this.branch);
    if (!archiveUrl.ok) {
      return archiveUrl;
    }

    let workspace: Workspace;
    try {
      workspace = await allocateWorkspace(this.options.workspaceRoot, name);
    } catch (error) {
      return fail("ProvisionError", `Unable to create workspace: ${describeError(error)}`);
    }

    try {
      const archive = await this.download(archiveUrl.value);
      await this.extract(archive, workspace);
    } catch (error) {
      await removeWorkspace(workspace);
      const failure =
        error instanceof BridgeError
          ? error
          : new BridgeError("ProvisionError", describeError(error), { archive_url: archiveUrl.value });
      this.options.logger.warn("workspace_provision_failed", { archive_url: archiveUrl.value, message: failure.message });
      return { ok: false, error: failure };
    }

    this.options.logger.info("workspace_materialized", { archive_url: archiveUrl.value, root: workspace.root });
    return succeed(workspace);
  }

  installDependencies(workspace: Workspace, signal?: AbortSignal): Promise<DependencyInstallReport> {
    return this.options.installer.install(workspace, signal);
  }

  private async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { redirect: "follow" });
    } catch (error) {
      throw new BridgeError("ProvisionError", `Archive download failed: ${describeError(error)}`, { archive_url: url });
    }
    if (!response.ok) {
      throw new BridgeError("ProvisionError", `Archive download failed with status ${response.status}`, {
        archive_url: url,
        status: response.status,
      });
    }

    const declared = Number(response.headers.get("content-length") ?? Number.NaN);
    if (Number.isFinite(declared) && declared > this.maxArchiveBytes) {
      throw this.sizeExceeded(url);
    }
    return this.readClampedBody(response, url);
  }

  /** Reads the response body while enforcing the archive size limit. */
  private async readClampedBody(response: Response, url: string): Promise<Buffer> {
    const body = response.body;
    if (!body) {
      return Buffer.alloc(0);
    }

    const reader = body.getReader();
    const chunks: Buffer[] = [];
    let total = 0;
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      total += value.byteLength;
      if (total > this.maxArchiveBytes) {
        await reader.cancel();
        throw this.sizeExceeded(url);
      }
      chunks.push(Buffer.from(value));
    }
    return Buffer.concat(chunks, total);
  }

  private sizeExceeded(url: string): BridgeError {
    return new BridgeError("ProvisionError", `Archive exceeds maximum allowed size of ${this.maxArchiveBytes} bytes`, {
      archive_url: url,
    });
  }

  private async extract(archive: Buffer, workspace: Workspace): Promise<void> {
    let zip: AdmZip;
    try {
      zip = new AdmZip(archive);
    } catch (error) {
      throw new BridgeError("ProvisionError", `Archive is not a valid zip file: ${describeError(error)}`);
    }

    const staging = path.join(workspace.root, "extract");
    let topLevel: string | null = null;
    for (const entry of zip.getEntries()) {
      const [head] = entry.entryName.split("/");
      const isFolder = entry.isDirectory || entry.entryName.includes("/");
      if (topLevel === null && head && isFolder) {
        topLevel = head;
      }

      let destination: string;
      try {
        destination = resolveWithin(staging, entry.entryName);
      } catch (error) {
        if (error instanceof PathResolutionError) {
          throw new BridgeError("ProvisionError", `Archive entry escapes the workspace: ${entry.entryName}`);
        }
        throw error;
      }

      if (entry.isDirectory) {
        await mkdir(destination, { recursive: true });
        continue;
      }
      await mkdir(path.dirname(destination), { recursive: true });
      await writeFile(destination, entry.getData());
    }

    if (topLevel === null) {
      throw new BridgeError("ProvisionError", "Archive does not contain a top-level folder");
    }
    await rename(path.join(staging, topLevel), workspace.path);
    await rm(staging, { recursive: true, force: true });
  }
}
