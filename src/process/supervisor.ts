import { stat } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { fail, succeed, type Outcome } from "../bridge/errors.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, hasErrnoCode, type ProcessEnv } from "../nodePrimitives.js";
import { isRegularFile, resolveWithin } from "../paths.js";
import type { Workspace } from "../provisioning/workspace.js";
import { runtimeTimers } from "../runtime/timers.js";
import { matchesLanguage, type RuntimeProfile } from "../runtimes/profiles.js";
import { HANDSHAKE_LINES } from "./handshake.js";
import { DEFAULT_KILL_GRACE_MS, ServerProcess, type ExitStatus } from "./serverProcess.js";

/** How long a failed read waits for the exit status before reporting it. */
const EXIT_STATUS_WAIT_MS = 500;

export interface ReceiveOptions {
  /** Append the stderr tail to the failure message (single-shot mode). */
  readonly captureStderr?: boolean;
}

/** Lifecycle operations on one server process. */
export interface ServerSupervisor {
  /** `true` when {@link spawn} accepts descriptors declaring {@link language}. */
  supportsLanguage(language: string): boolean;
  spawn(workspace: Workspace, entrypointPath: string, language: string): Promise<Outcome<ServerProcess>>;
  handshake(server: ServerProcess): Promise<Outcome<void>>;
  send(server: ServerProcess, line: string): Promise<Outcome<void>>;
  receiveLine(server: ServerProcess, options?: ReceiveOptions): Promise<Outcome<string>>;
  kill(server: ServerProcess): Promise<void>;
  isAlive(server: ServerProcess): boolean;
}

export interface ProcessSupervisorOptions {
  readonly profile: RuntimeProfile;
  readonly gateway: ChildProcessGateway;
  /** Shared dependency directory prepended to the module search path when it exists. */
  readonly dependencyTarget?: string | null;
  readonly logger: StructuredLogger;
  readonly killGraceMs?: number;
  /** Environment inherited by servers (defaults to `process.env`). */
  readonly inheritEnv?: ProcessEnv;
}

/**
 * Spawns servers through the child-process gateway and drives their stdio
 * as a strictly half-duplex, newline-delimited channel.
 */
export class ProcessSupervisor implements ServerSupervisor {
  private readonly killGraceMs: number;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  supportsLanguage(language: string): boolean {
    return matchesLanguage(this.options.profile, language);
  }

  async spawn(workspace: Workspace, entrypointPath: string, language: string): Promise<Outcome<ServerProcess>> {
    const { profile, logger } = this.options;
    if (!this.supportsLanguage(language)) {
      return fail("UnsupportedLanguage", `Unsupported language: ${language}`, { supported: profile.language });
    }

    let entrypoint: string;
    try {
      entrypoint = resolveWithin(workspace.path, entrypointPath);
    } catch {
      return fail("EntrypointMissing", `Entrypoint escapes the workspace: ${entrypointPath}`);
    }
    if (!(await isRegularFile(entrypoint))) {
      return fail("EntrypointMissing", `Entrypoint not found: ${entrypointPath}`, { entrypoint });
    }

    const inheritEnv = this.options.inheritEnv ?? process.env;
    const searchVariable = profile.searchPathVariable;
    const searchPath = await this.buildSearchPath(workspace, inheritEnv[searchVariable]);

    let server: ServerProcess;
    try {
      const spawned = this.options.gateway.spawn({
        command: profile.command,
        args: profile.buildArgs(entrypoint),
        cwd: workspace.path,
        allowedEnvKeys: [...Object.keys(inheritEnv), searchVariable],
        inheritEnv,
        extraEnv: { [searchVariable]: searchPath },
      });
      server = new ServerProcess(spawned, workspace);
    } catch (error) {
      return fail("ProcessExited", `Unable to start ${profile.command}: ${describeError(error)}`);
    }

    if (server.pid === undefined) {
      await server.waitForExit();
      await server.kill(this.killGraceMs);
      const reason = server.startFailure ? describeError(server.startFailure) : "no pid assigned";
      logger.error("server_spawn_failed", { command: profile.command, entrypoint, reason });
      return fail("ProcessExited", `Unable to start ${profile.command}: ${reason}`);
    }

    logger.info("server_spawned", { pid: server.pid, command: profile.command, entrypoint });
    return succeed(server);
  }

  async handshake(server: ServerProcess): Promise<Outcome<void>> {
    if (server.ready) {
      return succeed(undefined);
    }

    const [initializeLine, initializedLine] = HANDSHAKE_LINES;
    const initializeError = await writeRaw(server, initializeLine);
    if (initializeError) {
      return fail("HandshakeFailure", `Unable to send initialize: ${describeError(initializeError)}`);
    }

    const response = await server.stdout.next();
    if (response === null) {
      const status = await this.settledExit(server);
      return fail("HandshakeFailure", "Server closed its output before answering initialize", {
        exit_code: status?.code ?? null,
        signal: status?.signal ?? null,
        stderr: server.stderr.toString(),
      });
    }

    const initializedError = await writeRaw(server, initializedLine);
    if (initializedError) {
      return fail("HandshakeFailure", `Unable to send initialized notification: ${describeError(initializedError)}`);
    }

    server.markReady();
    this.options.logger.info("handshake_completed", { pid: server.pid });
    return succeed(undefined);
  }

  async send(server: ServerProcess, line: string): Promise<Outcome<void>> {
    const error = await writeRaw(server, `${line}\n`);
    if (error) {
      return fail("BrokenPipe", `Unable to write to server: ${describeError(error)}`, { pid: server.pid });
    }
    return succeed(undefined);
  }

  async receiveLine(server: ServerProcess, options: ReceiveOptions = {}): Promise<Outcome<string>> {
    const line = await server.stdout.next();
    if (line !== null) {
      return succeed(line);
    }

    const status = await this.settledExit(server);
    const stderr = server.stderr.toString();
    let message = describeExit(status);
    if (options.captureStderr && stderr.length > 0) {
      message = `${message}: ${stderr}`;
    }
    return fail("ProcessExited", message, {
      exit_code: status?.code ?? null,
      signal: status?.signal ?? null,
      ...(options.captureStderr ? { stderr } : {}),
    });
  }

  async kill(server: ServerProcess): Promise<void> {
    const wasAlive = server.isAlive();
    await server.kill(this.killGraceMs);
    if (wasAlive) {
      this.options.logger.info("server_killed", { pid: server.pid, exit: server.exit });
    }
  }

  isAlive(server: ServerProcess): boolean {
    return server.isAlive();
  }

  private async buildSearchPath(workspace: Workspace, previous: string | undefined): Promise<string> {
    const entries: string[] = [];
    const target = this.options.dependencyTarget;
    if (target) {
      try {
        if ((await stat(target)).isDirectory()) {
          entries.push(path.resolve(target));
        }
      } catch (error) {
        if (!hasErrnoCode(error, "ENOENT")) {
          this.options.logger.warn("dependency_target_unreadable", { target, message: describeError(error) });
        }
      }
    }
    entries.push(workspace.path);
    if (previous) {
      entries.push(previous);
    }
    return entries.join(path.delimiter);
  }

  /** Exit status of a server whose output ended, waiting briefly for it to be reaped. */
  private settledExit(server: ServerProcess): Promise<ExitStatus | null> {
    if (server.exit) {
      return Promise.resolve(server.exit);
    }
    return new Promise<ExitStatus | null>((resolve) => {
      const timer = runtimeTimers.setTimeout(() => resolve(server.exit), EXIT_STATUS_WAIT_MS);
      void server.waitForExit().then((status) => {
        runtimeTimers.clearTimeout(timer);
        resolve(status);
      });
    });
  }
}

function describeExit(status: ExitStatus | null): string {
  if (status === null) {
    return "Server closed its output stream";
  }
  if (status.signal) {
    return `Server process was terminated by ${status.signal}`;
  }
  if (status.code === 0) {
    return "Server process exited normally (code 0) without answering";
  }
  if (status.code === null) {
    return "Server process could not be started";
  }
  return `Server process crashed with exit code ${status.code}`;
}

/** Writes raw text to the server's stdin, resolving with the failure if any. */
function writeRaw(server: ServerProcess, text: string): Promise<Error | null> {
  return new Promise<Error | null>((resolve) => {
    const stdin = server.child.stdin;
    if (!stdin || !server.writable) {
      resolve(server.stdinError ?? new Error("server input stream is closed"));
      return;
    }
    stdin.write(text, (error) => resolve(error ?? null));
  });
}
