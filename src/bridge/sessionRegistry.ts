import { runWithSessionContext, type SessionTransport } from "../infra/sessionContext.js";
import type { StructuredLogger } from "../logger.js";
import type { ConnectionParams } from "./connectionParams.js";
import { fail, type Outcome } from "./errors.js";
import type { ProtocolBridge, RelayResult } from "./protocolBridge.js";
import { Session } from "./session.js";

/**
 * Process-wide table of persistent sessions keyed by connection identifier.
 *
 * Messages for a key run behind that key's promise chain, so they are relayed
 * one at a time in arrival order. A disconnect does not queue: it starts the
 * teardown at once, and the in-flight cold start or relay notices it at its
 * next suspension point. Different keys never contend.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly disconnected = new WeakSet<Session>();
  private closed = false;

  constructor(
    private readonly bridge: ProtocolBridge,
    private readonly logger: StructuredLogger,
  ) {}

  /** Number of registered sessions. */
  get size(): number {
    return this.sessions.size;
  }

  get(key: string): Session | undefined {
    return this.sessions.get(key);
  }

  /** Registers an `Idle` session for a new connection. No process work happens. */
  connect(key: string, transport: SessionTransport, params: ConnectionParams): Promise<Session> {
    return this.runExclusive(key, async () => {
      const existing = this.sessions.get(key);
      if (existing && !existing.closing) {
        return existing;
      }
      const session = new Session(key, transport, params);
      this.sessions.set(key, session);
      this.withContext(session, () => this.logger.info("session_connected", { params_name: params.name ?? null }));
      return session;
    });
  }

  /**
   * Relays one inbound line for {@link key}. When no live session exists (first
   * message, or the previous session failed or was disconnected) a fresh `Idle`
   * session is created from {@link params}. Messages queued before a
   * disconnect of their session are refused.
   */
  dispatch(
    key: string,
    transport: SessionTransport,
    params: ConnectionParams,
    raw: string,
  ): Promise<Outcome<RelayResult>> {
    const queuedFor = this.sessions.get(key);
    return this.runExclusive(key, async () => {
      if (this.closed || (queuedFor && this.disconnected.has(queuedFor))) {
        return fail<RelayResult>("ProcessExited", `Connection ${key} was closed`);
      }
      let session = this.sessions.get(key);
      if (!session || session.closing) {
        session = new Session(key, transport, params);
        this.sessions.set(key, session);
      }
      const active = session;
      const outcome = await this.withContext(active, () => this.bridge.handleMessage(active, raw));
      if (active.closing && this.sessions.get(key) === active) {
        this.sessions.delete(key);
      }
      return outcome;
    });
  }

  /**
   * Tears the session down without waiting for in-flight work: killing the
   * process releases a pending handshake or relay read, and a cold start
   * still provisioning discards what it obtains.
   */
  async disconnect(key: string): Promise<void> {
    const session = this.sessions.get(key);
    if (!session) {
      return;
    }
    this.sessions.delete(key);
    this.disconnected.add(session);
    const interrupted = session.state;
    await this.withContext(session, async () => {
      await this.bridge.terminate(session);
      this.logger.info("session_disconnected", { interrupted_state: interrupted });
    });
  }

  /** Disconnects every registered session and refuses later messages. */
  async closeAll(): Promise<void> {
    this.closed = true;
    await Promise.all(Array.from(this.sessions.keys(), (key) => this.disconnect(key)));
  }

  private withContext<T>(session: Session, callback: () => T): T {
    return runWithSessionContext(
      { sessionId: session.sessionId, transport: session.transport, serverName: session.serverName },
      callback,
    );
  }

  private runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, settled);
    void settled.then(() => {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    });
    return run;
  }
}
