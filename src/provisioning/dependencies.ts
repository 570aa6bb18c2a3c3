import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { ChildProcess } from "node:child_process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { isRegularFile } from "../paths.js";
import { OutputTail } from "../process/outputTail.js";
import type { RuntimeProfile } from "../runtimes/profiles.js";
import type { Workspace } from "./workspace.js";

export const DEFAULT_INSTALL_TIMEOUT_MS = 180_000;

export type DependencyInstallReport =
  | { status: "skipped"; reason: string }
  | { status: "installed"; manifest: string; durationMs: number }
  | { status: "failed"; manifest: string; durationMs: number; reason: string; exitCode: number | null };

export interface DependencyInstallerOptions {
  readonly profile: RuntimeProfile;
  readonly gateway: ChildProcessGateway;
  /** Shared directory receiving the installed packages. */
  readonly targetDir: string;
  readonly timeoutMs?: number;
  readonly logger: StructuredLogger;
}

/**
 * Best-effort installer for the runtime's dependency manifest. Every failure
 * is logged as `DependencyInstallFailure` and reported, never raised: a
 * server missing optional packages may still start.
 */
export class DependencyInstaller {
  private readonly timeoutMs: number;

  constructor(private readonly options: DependencyInstallerOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS;
  }

  get targetDir(): string {
    return this.options.targetDir;
  }

  /** Aborting {@link signal} stops a running installer; the report is then `failed`. */
  async install(workspace: Workspace, signal?: AbortSignal): Promise<DependencyInstallReport> {
    const { profile, logger } = this.options;
    if (signal?.aborted) {
      return { status: "skipped", reason: "installation cancelled" };
    }
    const manifestName = profile.dependencyManifest;
    if (manifestName === null) {
      return { status: "skipped", reason: `runtime ${profile.language} has no dependency manifest` };
    }

    const manifest = path.join(workspace.path, manifestName);
    let args: string[] | null;
    try {
      if (!(await isRegularFile(manifest))) {
        return { status: "skipped", reason: `${manifestName} not found` };
      }
      args = profile.installArgs(manifest, this.options.targetDir);
      if (args === null) {
        return { status: "skipped", reason: `runtime ${profile.language} has no installer` };
      }
      await mkdir(this.options.targetDir, { recursive: true });
    } catch (error) {
      return this.reportFailure(manifest, 0, describeError(error), null);
    }

    const startedAt = Date.now();
    logger.info("dependency_install_started", { manifest, target: this.options.targetDir });

    const stderr = new OutputTail(2_048);
    let exitCode: number | null;
    try {
      const spawned = this.options.gateway.spawn({
        command: profile.command,
        args,
        cwd: workspace.path,
        allowedEnvKeys: Object.keys(process.env),
        timeoutMs: this.timeoutMs,
        signal,
      });
      // pip is chatty; an unread pipe would block it once the buffer fills.
      spawned.child.stdout?.resume();
      spawned.child.stderr?.on("data", (chunk: Buffer) => stderr.append(chunk));
      exitCode = await waitForCompletion(spawned.child);
    } catch (error) {
      return this.reportFailure(manifest, Date.now() - startedAt, describeError(error), null);
    }

    const durationMs = Date.now() - startedAt;
    if (exitCode !== 0) {
      const reason = stderr.toString() || `installer exited with ${exitCode === null ? "a signal" : `code ${exitCode}`}`;
      return this.reportFailure(manifest, durationMs, reason, exitCode);
    }

    logger.info("dependency_install_completed", { manifest, duration_ms: durationMs });
    return { status: "installed", manifest, durationMs };
  }

  private reportFailure(
    manifest: string,
    durationMs: number,
    reason: string,
    exitCode: number | null,
  ): DependencyInstallReport {
    this.options.logger.warn("dependency_install_failed", {
      kind: "DependencyInstallFailure",
      manifest,
      reason,
      exit_code: exitCode,
    });
    return { status: "failed", manifest, durationMs, reason, exitCode };
  }
}

/**
 * Resolves with the exit code once the child closed (`null` when killed by a
 * signal, the timeout included); rejects when the process could not start.
 */
function waitForCompletion(child: ChildProcess): Promise<number | null> {
  return new Promise<number | null>((resolve, reject) => {
    child.once("error", (error) => {
      if (child.exitCode === null && child.signalCode === null && child.pid === undefined) {
        reject(error);
      }
    });
    child.once("close", (code: number | null) => resolve(code));
  });
}
