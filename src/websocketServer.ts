import type { IncomingMessage, Server as NodeHttpServer } from "node:http";
import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import WebSocket, { WebSocketServer, type RawData } from "ws";

import { descriptorOverride, parseConnectionParams, type ConnectionParams } from "./bridge/connectionParams.js";
import type { Outcome } from "./bridge/errors.js";
import type { RelayResult } from "./bridge/protocolBridge.js";
import type { SessionRegistry } from "./bridge/sessionRegistry.js";
import type { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";

/** Close code used when a connection is refused for missing parameters. */
export const POLICY_VIOLATION = 1008;

export interface WebSocketGatewayOptions {
  /** Request path accepting upgrades. */
  readonly path: string;
}

export interface WebSocketGatewayHandle {
  /** Number of open client connections. */
  readonly clientCount: number;
  close(): Promise<void>;
}

/**
 * Serves persistent sessions over WebSocket on an existing HTTP listener.
 * Each connection owns one registry entry; each text frame is one inbound
 * message and each reply is one frame.
 */
export function attachWebSocketGateway(
  server: NodeHttpServer,
  registry: SessionRegistry,
  options: WebSocketGatewayOptions,
  logger: StructuredLogger,
): WebSocketGatewayHandle {
  const wss = new WebSocketServer({ noServer: true });

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = req.url ? new URL(req.url, `http://${req.headers.host ?? "localhost"}`) : null;
    if (!url || url.pathname !== options.path) {
      socket.end("HTTP/1.1 404 Not Found\r\n\r\n");
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  };
  server.on("upgrade", onUpgrade);

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const parsed = parseConnectionParams(url.searchParams);
    if (!parsed.ok) {
      ws.close(POLICY_VIOLATION, parsed.error.message);
      return;
    }
    const params = parsed.value;
    if (params.name === undefined && descriptorOverride(params) === null) {
      logger.warn("websocket_rejected", { reason: "missing_name" });
      ws.close(POLICY_VIOLATION, "Missing 'name' parameter");
      return;
    }

    const connectionId = randomUUID();
    registry.connect(connectionId, "websocket", params).then(
      () => logger.info("websocket_connected", { connection_id: connectionId, server_name: params.name ?? null }),
      (error: unknown) => logger.error("websocket_connect_failed", { connection_id: connectionId, message: describeError(error) }),
    );

    ws.on("message", (data: RawData) => {
      relayFrame(ws, registry, connectionId, params, decodeText(data), logger);
    });

    ws.on("error", (error: Error) => {
      logger.warn("websocket_error", { connection_id: connectionId, message: error.message });
    });

    ws.once("close", (code: number) => {
      logger.info("websocket_closed", { connection_id: connectionId, code });
      registry.disconnect(connectionId).catch((error: unknown) => {
        logger.error("websocket_disconnect_failed", { connection_id: connectionId, message: describeError(error) });
      });
    });
  });

  return {
    get clientCount() {
      return wss.clients.size;
    },
    close: async () => {
      server.removeListener("upgrade", onUpgrade);
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
  };
}

function relayFrame(
  ws: WebSocket,
  registry: SessionRegistry,
  connectionId: string,
  params: ConnectionParams,
  raw: string,
  logger: StructuredLogger,
): void {
  registry.dispatch(connectionId, "websocket", params, raw).then(
    (outcome: Outcome<RelayResult>) => {
      if (!outcome.ok) {
        sendFrame(ws, JSON.stringify(outcome.error.toEnvelope()), logger);
      } else if (outcome.value !== null) {
        sendFrame(ws, outcome.value, logger);
      }
    },
    (error: unknown) => {
      logger.error("websocket_relay_failed", { connection_id: connectionId, message: describeError(error) });
    },
  );
}

/** Sends one frame; a closed peer is only worth a debug entry. */
function sendFrame(ws: WebSocket, text: string, logger: StructuredLogger): void {
  if (ws.readyState !== WebSocket.OPEN) {
    logger.debug("websocket_send_skipped", { ready_state: ws.readyState });
    return;
  }
  ws.send(text, (error) => {
    if (error) {
      logger.debug("websocket_send_failed", { message: error.message });
    }
  });
}

function decodeText(raw: RawData): string {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return raw.toString("utf8");
}
