import { fail, succeed, type Outcome } from "./errors.js";

/** In-band field naming the target server; never forwarded to the child. */
export const SERVER_NAME_FIELD = "_mcp_name";

/**
 * Inbound line after preparation: the text to write to the child plus the
 * facts the bridge needs about it.
 */
export interface PreparedMessage {
  /** Serialised line, without the trailing newline. */
  readonly line: string;
  /** Value of the in-band server name field, when present and a string. */
  readonly serverName: string | undefined;
  /** `true` when the message carries a `method` but no `id`. */
  readonly isNotification: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Strips the in-band server name and adds `params: {}` to requests that carry
 * a `method` and an `id` but no `params`. Text that is not a JSON object is
 * forwarded verbatim.
 */
export function prepareInbound(raw: string): PreparedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { line: raw, serverName: undefined, isNotification: false };
  }
  if (!isPlainObject(parsed)) {
    return { line: raw, serverName: undefined, isNotification: false };
  }

  const { [SERVER_NAME_FIELD]: inbandName, ...message } = parsed;
  const hasMethod = "method" in message;
  const hasId = "id" in message;
  if (hasMethod && hasId && !("params" in message)) {
    message.params = {};
  }

  return {
    line: JSON.stringify(message),
    serverName: typeof inbandName === "string" && inbandName.trim().length > 0 ? inbandName.trim() : undefined,
    isNotification: hasMethod && !hasId,
  };
}

/**
 * Validates a single-shot request body: exactly one JSON object, returned
 * re-serialised on a single line.
 */
export function parseRequestBody(body: string): Outcome<string> {
  if (body.trim().length === 0) {
    return fail("InvalidRequest", "Request body must contain one JSON-RPC message");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return fail("InvalidRequest", `Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(parsed)) {
    return fail("InvalidRequest", "Request body must be a JSON object");
  }
  return succeed(JSON.stringify(parsed));
}
