import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer, type ServerResponse } from "node:http";
import { Buffer } from "node:buffer";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { parseConnectionParams } from "./bridge/connectionParams.js";
import { BridgeError } from "./bridge/errors.js";
import { parseRequestBody } from "./bridge/messages.js";
import type { ProtocolBridge } from "./bridge/protocolBridge.js";
import type { SessionRegistry } from "./bridge/sessionRegistry.js";
import { MAX_BODY_BYTES, PayloadTooLargeError, readTextBody } from "./http/body.js";
import { applyCorsHeaders, applySecurityHeaders, ensureRequestId } from "./http/headers.js";
import type { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";

export interface HttpServerOptions {
  readonly host: string;
  readonly port: number;
  readonly maxBodyBytes?: number;
}

export interface HttpServerDeps {
  readonly bridge: ProtocolBridge;
  readonly registry: SessionRegistry;
  readonly logger: StructuredLogger;
}

export interface HttpServerHandle {
  readonly server: NodeHttpServer;
  /** Port the listener is bound to (useful when `0` was requested). */
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Starts the HTTP listener serving single-shot calls (`POST /<name>`) and the
 * `/healthz` probe. The WebSocket gateway attaches to the returned server.
 */
export async function startHttpServer(
  options: HttpServerOptions,
  deps: HttpServerDeps,
): Promise<HttpServerHandle> {
  const { logger } = deps;
  const httpServer = createHttpServer((req, res) => {
    handleRequest(req, res, options, deps).catch((error: unknown) => {
      logger.error("http_request_failure", { message: describeError(error) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal error", type: "InternalError" });
      } else {
        res.end();
      }
    });
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: describeError(error) });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: describeError(error) });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.removeListener("error", reject);
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
      });
      resolve();
    });
  });

  return {
    server: httpServer,
    port: extractListeningPort(httpServer),
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        httpServer.closeAllConnections();
      });
    },
  };
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpServerOptions,
  deps: HttpServerDeps,
): Promise<void> {
  const { bridge, registry, logger } = deps;
  applySecurityHeaders(res);
  applyCorsHeaders(res);
  const startedAt = process.hrtime.bigint();
  const requestId = ensureRequestId(req, res);
  const method = req.method ?? "UNKNOWN";
  const requestUrl = req.url ? new URL(req.url, `http://${req.headers.host ?? "localhost"}`) : null;

  if (!requestUrl) {
    sendError(res, new BridgeError("InvalidRequest", "Invalid request URL"));
    return;
  }

  if (method === "OPTIONS") {
    res.statusCode = 204;
    res.end();
    return;
  }

  if (requestUrl.pathname === "/healthz" && method === "GET") {
    sendJson(res, 200, { ok: true, sessions: registry.size });
    logger.debug("http_healthz", { request_id: requestId, sessions: registry.size });
    return;
  }

  if (method !== "POST") {
    res.setHeader("Allow", "POST, OPTIONS");
    sendJson(res, 405, { error: "Method not allowed", type: "InvalidRequest" });
    return;
  }

  const pathName = lastPathSegment(requestUrl.pathname);
  const params = parseConnectionParams(requestUrl.searchParams);
  if (!params.ok) {
    sendError(res, params.error);
    return;
  }

  let body: string;
  try {
    body = await readTextBody(req, options.maxBodyBytes ?? MAX_BODY_BYTES);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      sendJson(res, 413, { error: error.message, type: "InvalidRequest" });
      logger.warn("http_payload_too_large", { request_id: requestId, max_bytes: error.maxBytes });
      return;
    }
    throw error;
  }

  const line = parseRequestBody(body);
  if (!line.ok) {
    sendError(res, line.error);
    return;
  }

  const outcome = await bridge.invoke({ ...params.value, name: pathName ?? params.value.name }, line.value);
  let status: number;
  if (!outcome.ok) {
    status = sendError(res, outcome.error);
  } else if (outcome.value === null) {
    status = 202;
    res.statusCode = status;
    res.end();
  } else {
    status = 200;
    res.statusCode = status;
    res.setHeader("Content-Type", "application/json");
    res.end(outcome.value, "utf8");
  }

  const log = status >= 500 ? logger.warn.bind(logger) : logger.info.bind(logger);
  log("http_request_completed", {
    request_id: requestId,
    server_name: pathName ?? params.value.name ?? null,
    status,
    error_type: outcome.ok ? null : outcome.error.kind,
    bytes_in: Buffer.byteLength(body, "utf8"),
    duration_ms: Number((process.hrtime.bigint() - startedAt) / 1_000_000n),
  });
}

/** Last non-empty segment of the request path, percent-decoded. */
export function lastPathSegment(pathname: string): string | undefined {
  const segments = pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (last === undefined) {
    return undefined;
  }
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

function sendError(res: ServerResponse, error: BridgeError): number {
  sendJson(res, error.httpStatus, error.toEnvelope());
  return error.httpStatus;
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload), "utf8");
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (address && typeof address === "object") {
    return address.port;
  }
  return 0;
}
