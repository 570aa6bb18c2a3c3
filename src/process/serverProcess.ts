import type { ChildProcess } from "node:child_process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { SpawnedChildProcess } from "../gateways/childProcess.js";
import type { Workspace } from "../provisioning/workspace.js";
import { runtimeTimers } from "../runtime/timers.js";
import { LineReader } from "./lineReader.js";
import { OutputTail } from "./outputTail.js";

/** Grace period between `SIGTERM` and `SIGKILL`. */
export const DEFAULT_KILL_GRACE_MS = 2_000;

export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * Handle over one running server. Created by the supervisor, marked ready by
 * the handshake and destroyed by {@link kill}.
 */
export class ServerProcess {
  readonly pid: number | undefined;
  readonly workspace: Workspace;
  readonly startedAt: number;
  readonly stdout: LineReader;
  readonly stderr = new OutputTail();

  private readyFlag = false;
  private exitStatus: ExitStatus | null = null;
  private spawnFailure: Error | null = null;
  private stdinFailure: Error | null = null;
  private killing: Promise<void> | null = null;
  private readonly exited: Promise<ExitStatus>;

  private readonly onStderr = (chunk: Buffer | string) => this.stderr.append(chunk);

  constructor(
    private readonly spawned: SpawnedChildProcess,
    workspace: Workspace,
  ) {
    const child = spawned.child;
    this.pid = child.pid;
    this.workspace = workspace;
    this.startedAt = Date.now();
    if (!child.stdout || !child.stdin) {
      throw new Error("server process must be spawned with piped stdio");
    }
    this.stdout = new LineReader(child.stdout);
    child.stderr?.on("data", this.onStderr);
    child.stdin.on("error", (error: Error) => {
      this.stdinFailure = error;
    });

    this.exited = new Promise<ExitStatus>((resolve) => {
      child.on("error", (error: Error) => {
        // Spawn failures never emit `exit`.
        if (child.pid === undefined) {
          this.spawnFailure = error;
          this.exitStatus = { code: null, signal: null };
          this.stdout.close();
          resolve(this.exitStatus);
        }
      });
      child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitStatus = { code, signal };
        resolve(this.exitStatus);
      });
    });
  }

  get child(): ChildProcess {
    return this.spawned.child;
  }

  get ready(): boolean {
    return this.readyFlag;
  }

  markReady(): void {
    this.readyFlag = true;
  }

  /** Exit status once the process terminated, `null` while it runs. */
  get exit(): ExitStatus | null {
    return this.exitStatus;
  }

  /** Error raised by the OS when the interpreter could not be started. */
  get startFailure(): Error | null {
    return this.spawnFailure;
  }

  isAlive(): boolean {
    return this.exitStatus === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  /** `true` when a line can still be written to the process. */
  get writable(): boolean {
    const stdin = this.child.stdin;
    return this.isAlive() && this.stdinFailure === null && stdin !== null && stdin.writable && !stdin.destroyed;
  }

  get stdinError(): Error | null {
    return this.stdinFailure;
  }

  /** Resolves with the exit status once the process terminated. */
  waitForExit(): Promise<ExitStatus> {
    return this.exited;
  }

  /**
   * Terminates the process: `SIGTERM`, then `SIGKILL` once {@link graceMs}
   * elapsed. Idempotent; resolves when the process has exited.
   */
  kill(graceMs = DEFAULT_KILL_GRACE_MS): Promise<void> {
    if (this.killing) {
      return this.killing;
    }
    this.killing = this.terminate(graceMs);
    return this.killing;
  }

  private async terminate(graceMs: number): Promise<void> {
    const child = this.child;
    if (this.isAlive() && this.pid !== undefined) {
      child.stdin?.end();
      child.kill("SIGTERM");
      const escalation = runtimeTimers.setTimeout(() => {
        if (this.isAlive()) {
          child.kill("SIGKILL");
        }
      }, graceMs);
      try {
        await this.exited;
      } finally {
        runtimeTimers.clearTimeout(escalation);
      }
    }
    this.release();
  }

  private release(): void {
    const child = this.child;
    this.stdout.close();
    child.stderr?.removeListener("data", this.onStderr);
    child.stdin?.destroy();
    this.spawned.dispose();
  }
}
