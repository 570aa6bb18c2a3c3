import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Transport through which a session reached the bridge. */
export type SessionTransport = "websocket" | "http";

/**
 * Correlation details exposed to every helper running on behalf of a session.
 * The logger reads them so supervisors and provisioners do not have to thread
 * identifiers through their signatures.
 */
export interface SessionContext {
  readonly sessionId: string;
  readonly transport: SessionTransport;
  /** Logical server name, once known (it may arrive in-band with the first message). */
  serverName?: string | null;
}

const storage = new AsyncLocalStorage<SessionContext>();

/** Runs {@link callback} with {@link context} visible to nested async work. */
export function runWithSessionContext<T>(context: SessionContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the session context associated with the current async execution. */
export function getSessionContext(): SessionContext | undefined {
  return storage.getStore();
}
