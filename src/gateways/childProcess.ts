/**
 * Shell-less spawning of interpreter processes. Commands and arguments are
 * validated, the environment is rebuilt from an allow-list, and the child is
 * killed once its `timeoutMs` elapses or its owner's `signal` aborts.
 */
import { spawn, type ChildProcess } from "node:child_process";

import type { ProcessEnv } from "../nodePrimitives.js";
import { runtimeTimers, type TimeoutHandle } from "../runtime/timers.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. */
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Only these keys reach the child, from {@link inheritEnv} or {@link extraEnv}. */
  readonly allowedEnvKeys: readonly string[];
  /** Defaults to `process.env`. */
  readonly inheritEnv?: ProcessEnv;
  /** Overrides; `undefined` removes an inherited value. */
  readonly extraEnv?: Record<string, string | undefined>;
  readonly timeoutMs?: number;
  /** Aborting it terminates the child (the session teardown signal, for instance). */
  readonly signal?: AbortSignal;
}

export interface SpawnedChildProcess {
  readonly child: ChildProcess;
  /** Aborted when the child was stopped by its timeout or by the caller's signal. */
  readonly signal: AbortSignal | undefined;
  /** Disarms the timeout and detaches from the caller's signal. Runs on exit as well. */
  dispose(): void;
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

export class ChildProcessEnvViolationError extends Error {
  constructor(key: string) {
    super(`Environment variable "${key}" is not allow-listed for the spawned child process.`);
    this.name = "ChildProcessEnvViolationError";
  }
}

export class ChildProcessTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Child process exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "ChildProcessTimeoutError";
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

export function createChildProcessGateway(): ChildProcessGateway {
  return { spawn: spawnGuarded };
}

function spawnGuarded(options: SpawnChildProcessOptions): SpawnedChildProcess {
  const { command } = options;
  if (typeof command !== "string" || command.trim().length === 0) {
    throw new InvalidChildProcessCommandError(command);
  }
  const args = normaliseArgs(options.args);
  const env = buildWhitelistedEnv({
    allowedKeys: options.allowedEnvKeys,
    inheritEnv: options.inheritEnv ?? process.env,
    extraEnv: options.extraEnv ?? {},
  });

  const lifetime = createLifetime(options.timeoutMs, options.signal);
  let child: ChildProcess;
  try {
    child = spawn(command, [...args], {
      cwd: options.cwd,
      env,
      stdio: "pipe",
      shell: false,
      ...(lifetime ? { signal: lifetime.signal } : {}),
    });
  } catch (error) {
    lifetime?.release();
    throw error;
  }
  lifetime?.watch(child);

  return {
    child,
    signal: lifetime?.signal,
    dispose: () => lifetime?.release(),
  };
}

function normaliseArgs(args: SpawnChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }
  return args.map((value, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

interface BuildEnvOptions {
  readonly allowedKeys: readonly string[];
  readonly inheritEnv: ProcessEnv;
  readonly extraEnv: Record<string, string | undefined>;
}

/** Fresh environment holding only allow-listed keys; overrides win over inherited values. */
export function buildWhitelistedEnv({ allowedKeys, inheritEnv, extraEnv }: BuildEnvOptions): ProcessEnv {
  const allowed = new Set(allowedKeys);
  for (const key of Object.keys(extraEnv)) {
    if (!allowed.has(key)) {
      throw new ChildProcessEnvViolationError(key);
    }
  }

  const env: ProcessEnv = {};
  for (const key of allowed) {
    const value = Object.prototype.hasOwnProperty.call(extraEnv, key) ? extraEnv[key] : inheritEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

interface ChildLifetime {
  /** Handed to `spawn`, which sends `SIGTERM` when it aborts. */
  readonly signal: AbortSignal;
  watch(child: ChildProcess): void;
  release(): void;
}

function createLifetime(timeoutMs: number | undefined, external: AbortSignal | undefined): ChildLifetime | null {
  if (timeoutMs === undefined && external === undefined) {
    return null;
  }

  const controller = new AbortController();
  const forward = () => controller.abort(external?.reason);
  if (external?.aborted) {
    forward();
  } else {
    external?.addEventListener("abort", forward, { once: true });
  }

  let timer: TimeoutHandle | null = null;
  const release = () => {
    runtimeTimers.clearTimeout(timer);
    timer = null;
    external?.removeEventListener("abort", forward);
  };

  return {
    signal: controller.signal,
    watch(child) {
      child.once("exit", release);
      child.once("error", release);
      if (timeoutMs === undefined || controller.signal.aborted) {
        return;
      }
      timer = runtimeTimers.setTimeout(() => {
        controller.abort(new ChildProcessTimeoutError(timeoutMs));
        // Interpreters may trap SIGTERM; a timeout is final.
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, timeoutMs);
    },
    release,
  };
}
