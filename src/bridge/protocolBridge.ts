import { randomUUID } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { Descriptor } from "../descriptors/descriptor.js";
import type { DescriptorResolver } from "../descriptors/resolver.js";
import { getSessionContext, runWithSessionContext } from "../infra/sessionContext.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import type { ReceiveOptions, ServerSupervisor } from "../process/supervisor.js";
import type { WorkspaceProvisioner } from "../provisioning/archiveProvisioner.js";
import { removeWorkspace } from "../provisioning/workspace.js";
import { runtimeTimers, type TimeoutHandle } from "../runtime/timers.js";
import { descriptorOverride, type ConnectionParams } from "./connectionParams.js";
import { fail, succeed, type Outcome } from "./errors.js";
import { prepareInbound, type PreparedMessage } from "./messages.js";
import { Session } from "./session.js";

export const DEFAULT_SINGLE_SHOT_TIMEOUT_MS = 30_000;

/** Reply to one inbound message: the relayed line, or `null` for notifications. */
export type RelayResult = string | null;

export interface ProtocolBridgeOptions {
  readonly resolver: DescriptorResolver;
  readonly provisioner: WorkspaceProvisioner;
  readonly supervisor: ServerSupervisor;
  readonly logger: StructuredLogger;
  readonly singleShotTimeoutMs?: number;
}

/**
 * Drives the session state machine: cold start on the first message, strict
 * request/response relay afterwards, teardown on disconnect or failure. Any
 * failure closes the session; nothing is retried.
 */
export class ProtocolBridge {
  private readonly singleShotTimeoutMs: number;

  constructor(private readonly options: ProtocolBridgeOptions) {
    this.singleShotTimeoutMs = options.singleShotTimeoutMs ?? DEFAULT_SINGLE_SHOT_TIMEOUT_MS;
  }

  /**
   * Handles one inbound line. A failure tears the session down before being
   * returned, so the caller only has to report it.
   */
  async handleMessage(session: Session, raw: string, receive: ReceiveOptions = {}): Promise<Outcome<RelayResult>> {
    if (session.closing) {
      return fail("ProcessExited", `Session ${session.sessionId} is closed`);
    }

    const message = prepareInbound(raw);
    if (session.state === "Idle") {
      const started = await this.coldStart(session, message.serverName);
      if (!started.ok) {
        await this.terminate(session);
        return started;
      }
    }

    const relayed = await this.relay(session, message, receive);
    if (!relayed.ok) {
      await this.terminate(session);
    }
    return relayed;
  }

  /**
   * Kills the process, removes the workspace and closes the session.
   * Idempotent: concurrent callers share the same teardown.
   */
  terminate(session: Session): Promise<void> {
    if (session.teardown) {
      return session.teardown;
    }
    if (session.state === "Closed") {
      return Promise.resolve();
    }
    session.transition("Terminating");
    session.teardown = this.release(session);
    return session.teardown;
  }

  /**
   * Single-shot mode: cold start, one relay and teardown inside a throwaway
   * session, bounded by a wall-clock timeout covering the whole sequence.
   */
  invoke(params: ConnectionParams, raw: string, timeoutMs = this.singleShotTimeoutMs): Promise<Outcome<RelayResult>> {
    const session = new Session(randomUUID(), "http", params);
    return runWithSessionContext({ sessionId: session.sessionId, transport: "http" }, async () => {
      let timer: TimeoutHandle | null = null;
      const deadline = new Promise<Outcome<RelayResult>>((resolve) => {
        timer = runtimeTimers.setTimeout(() => {
          resolve(fail("Timeout", `No response within ${timeoutMs} ms`, { timeout_ms: timeoutMs }));
        }, timeoutMs);
      });

      const outcome = await Promise.race([this.handleMessage(session, raw, { captureStderr: true }), deadline]);
      runtimeTimers.clearTimeout(timer);
      if (!outcome.ok && outcome.error.kind === "Timeout") {
        this.options.logger.warn("single_shot_timeout", { timeout_ms: timeoutMs, state: session.state });
      }
      await this.terminate(session);
      return outcome;
    });
  }

  private async coldStart(session: Session, inbandName: string | undefined): Promise<Outcome<void>> {
    const { logger, provisioner, supervisor } = this.options;
    const override = descriptorOverride(session.params);
    const name = inbandName ?? session.params.name;
    if (name === undefined && override === null) {
      return fail("InvalidRequest", "Missing 'name' parameter");
    }

    session.serverName = name ?? null;
    const context = getSessionContext();
    if (context) {
      context.serverName = session.serverName;
    }

    session.transition("Provisioning");
    logger.info("session_cold_start", { server_name: session.serverName, override: override !== null });

    let descriptor: Descriptor;
    if (override) {
      descriptor = override;
    } else if (name !== undefined) {
      const resolved = await this.options.resolver.resolve(name);
      if (!resolved.ok) {
        return resolved;
      }
      descriptor = resolved.value;
    } else {
      return fail("InvalidRequest", "Missing 'name' parameter");
    }
    session.descriptor = descriptor;
    if (session.closing) {
      return this.abandoned(session);
    }

    if (!supervisor.supportsLanguage(descriptor.language)) {
      return fail("UnsupportedLanguage", `Unsupported language: ${descriptor.language}`);
    }

    const materialized = await provisioner.materialize(descriptor.repositoryLocation, name ?? "override");
    if (!materialized.ok) {
      return materialized;
    }
    const workspace = materialized.value;
    if (session.closing) {
      await removeWorkspace(workspace);
      return this.abandoned(session);
    }
    session.workspace = workspace;

    const report = await provisioner.installDependencies(workspace, session.signal);
    logger.debug("dependency_install_report", { status: report.status });
    if (session.closing) {
      return this.abandoned(session);
    }

    session.transition("Handshaking");
    const spawned = await supervisor.spawn(workspace, descriptor.entrypointPath, descriptor.language);
    if (!spawned.ok) {
      return spawned;
    }
    if (session.closing) {
      await supervisor.kill(spawned.value);
      return this.abandoned(session);
    }
    session.process = spawned.value;

    const handshake = await supervisor.handshake(spawned.value);
    if (!handshake.ok) {
      return handshake;
    }
    if (session.closing) {
      return this.abandoned(session);
    }

    session.transition("Ready");
    logger.info("session_ready", { pid: spawned.value.pid, workspace: workspace.root });
    return succeed(undefined);
  }

  private async relay(session: Session, message: PreparedMessage, receive: ReceiveOptions): Promise<Outcome<RelayResult>> {
    const { supervisor } = this.options;
    if (session.closing) {
      return this.abandoned(session);
    }
    session.transition("Relaying");

    const server = session.process;
    if (server === null || !supervisor.isAlive(server)) {
      return fail("ProcessExited", "Server process is no longer running", { exit: server?.exit ?? null });
    }

    const sent = await supervisor.send(server, message.line);
    if (!sent.ok) {
      return sent;
    }
    if (session.closing) {
      return this.abandoned(session);
    }
    if (message.isNotification) {
      session.transition("Ready");
      return succeed(null);
    }

    const line = await supervisor.receiveLine(server, receive);
    if (!line.ok) {
      return line;
    }
    if (session.closing) {
      return this.abandoned(session);
    }
    session.transition("Ready");
    return succeed(line.value);
  }

  private abandoned<T>(session: Session): Outcome<T> {
    return fail("Timeout", `Session ${session.sessionId} was closed before completing`);
  }

  private async release(session: Session): Promise<void> {
    const { logger, supervisor } = this.options;
    try {
      if (session.process) {
        await supervisor.kill(session.process);
      }
    } catch (error) {
      logger.error("server_kill_failed", { message: describeError(error) });
    }
    try {
      if (session.workspace) {
        await removeWorkspace(session.workspace);
      }
    } catch (error) {
      logger.error("workspace_cleanup_failed", { root: session.workspace?.root, message: describeError(error) });
    }
    session.transition("Closed");
    logger.info("session_closed", { workspace: session.workspace?.root ?? null });
  }
}
