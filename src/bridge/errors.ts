import { describeError } from "../nodePrimitives.js";

/**
 * Canonical taxonomy of the failures surfaced by the bridge. Each entry
 * provides the HTTP status used by the single-shot transport and the default
 * human-readable message wired to that kind.
 */
export const BRIDGE_ERROR_TAXONOMY = {
  InvalidRequest: { status: 400, message: "Invalid request" },
  NotFound: { status: 404, message: "Server descriptor not found" },
  StoreError: { status: 502, message: "Descriptor store failure" },
  UnsupportedSource: { status: 400, message: "Unsupported repository source" },
  ProvisionError: { status: 502, message: "Workspace provisioning failed" },
  UnsupportedLanguage: { status: 400, message: "Unsupported server language" },
  EntrypointMissing: { status: 422, message: "Entrypoint not found in workspace" },
  HandshakeFailure: { status: 502, message: "Server did not answer the initialize request" },
  BrokenPipe: { status: 502, message: "Server input stream is closed" },
  ProcessExited: { status: 502, message: "Server process exited" },
  Timeout: { status: 504, message: "Server did not answer in time" },
  DependencyInstallFailure: { status: 500, message: "Dependency installation failed" },
} as const;

/** Union of every failure kind recognised by the bridge. */
export type BridgeErrorKind = keyof typeof BRIDGE_ERROR_TAXONOMY;

/** Wire format sent to transports when a message cannot be relayed. */
export interface ErrorEnvelope {
  error: string;
  type: BridgeErrorKind;
}

/**
 * Typed failure carried by every {@link Outcome}. Instances are plain values:
 * the bridge returns them rather than throwing so each boundary states which
 * kinds it may produce.
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;
  readonly details: Record<string, unknown> | undefined;

  constructor(kind: BridgeErrorKind, message?: string, details?: Record<string, unknown>) {
    super(message ?? BRIDGE_ERROR_TAXONOMY[kind].message);
    this.name = "BridgeError";
    this.kind = kind;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** HTTP status associated with the failure kind. */
  get httpStatus(): number {
    return BRIDGE_ERROR_TAXONOMY[this.kind].status;
  }

  toEnvelope(): ErrorEnvelope {
    return { error: this.message, type: this.kind };
  }
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: BridgeError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: BridgeErrorKind,
  message?: string,
  details?: Record<string, unknown>,
): Outcome<T> {
  return { ok: false, error: new BridgeError(kind, message, details) };
}

/**
 * Wraps an arbitrary thrown value into a {@link BridgeError}. Existing bridge
 * errors are returned untouched so their kind survives re-wrapping.
 */
export function toBridgeError(error: unknown, fallbackKind: BridgeErrorKind): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }
  return new BridgeError(fallbackKind, describeError(error));
}
