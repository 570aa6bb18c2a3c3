import type { JSONRPCNotification, JSONRPCRequest } from "@modelcontextprotocol/sdk/types.js";
import { serializeMessage } from "@modelcontextprotocol/sdk/shared/stdio.js";

/** Protocol revision announced to every server. */
export const HANDSHAKE_PROTOCOL_VERSION = "2025-11-25";

/** Identity the bridge presents in `clientInfo`. */
export const BRIDGE_CLIENT_INFO = { name: "stdio-bridge", version: "1.0.0" } as const;

export const INITIALIZE_REQUEST: JSONRPCRequest = {
  jsonrpc: "2.0",
  id: 0,
  method: "initialize",
  params: {
    protocolVersion: HANDSHAKE_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo: { ...BRIDGE_CLIENT_INFO },
  },
};

export const INITIALIZED_NOTIFICATION: JSONRPCNotification = {
  jsonrpc: "2.0",
  method: "notifications/initialized",
};

/** Wire lines, newline included, written during the handshake in this order. */
export const HANDSHAKE_LINES = [serializeMessage(INITIALIZE_REQUEST), serializeMessage(INITIALIZED_NOTIFICATION)] as const;
