import type { Descriptor } from "../descriptors/descriptor.js";
import type { SessionTransport } from "../infra/sessionContext.js";
import type { ServerProcess } from "../process/serverProcess.js";
import type { Workspace } from "../provisioning/workspace.js";
import type { ConnectionParams } from "./connectionParams.js";

export type SessionState =
  | "Idle"
  | "Provisioning"
  | "Handshaking"
  | "Ready"
  | "Relaying"
  | "Terminating"
  | "Closed";

/** Allowed successors of every state. */
const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  Idle: ["Provisioning", "Terminating"],
  Provisioning: ["Handshaking", "Terminating"],
  Handshaking: ["Ready", "Terminating"],
  Ready: ["Relaying", "Terminating"],
  Relaying: ["Ready", "Terminating"],
  Terminating: ["Closed"],
  Closed: [],
};

export class IllegalTransitionError extends Error {
  constructor(sessionId: string, from: SessionState, to: SessionState) {
    super(`Session ${sessionId} cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * One logical conversation with a server process. The session owns its
 * workspace and process; both are released when it reaches `Closed`.
 */
export class Session {
  readonly sessionId: string;
  readonly transport: SessionTransport;
  readonly params: ConnectionParams;
  serverName: string | null = null;
  descriptor: Descriptor | null = null;
  workspace: Workspace | null = null;
  process: ServerProcess | null = null;
  /** Pending teardown, shared by concurrent terminate calls. */
  teardown: Promise<void> | null = null;
  private current: SessionState = "Idle";
  private readonly history: SessionState[] = ["Idle"];
  private readonly cancellation = new AbortController();

  constructor(sessionId: string, transport: SessionTransport, params: ConnectionParams) {
    this.sessionId = sessionId;
    this.transport = transport;
    this.params = params;
  }

  get state(): SessionState {
    return this.current;
  }

  /** States visited so far, in order. */
  get transitions(): readonly SessionState[] {
    return this.history;
  }

  /** Aborted when the session enters `Terminating`; stops child work started on its behalf. */
  get signal(): AbortSignal {
    return this.cancellation.signal;
  }

  /** `true` once teardown started. */
  get closing(): boolean {
    return this.current === "Terminating" || this.current === "Closed";
  }

  /** @throws {IllegalTransitionError} when the move is not allowed. */
  transition(to: SessionState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.sessionId, this.current, to);
    }
    this.current = to;
    this.history.push(to);
    if (to === "Terminating") {
      this.cancellation.abort();
    }
  }
}
