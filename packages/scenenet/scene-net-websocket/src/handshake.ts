import { createHash } from "node:crypto";

import { SceneWebSocketError, SceneWebSocketErrors } from "./errors";

export const WEBSOCKET_ACCEPT_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

export const DEFAULT_MAX_HANDSHAKE_BYTES = 8192;

export type HandshakeRequest = {
  requestLine: string;
  // Lower-cased header names
  headers: Map<string, string>;
  key: string;
};

export function computeAcceptKey(key: string): string {
  return createHash("sha1")
    .update(key + WEBSOCKET_ACCEPT_GUID)
    .digest("base64");
}

export function parseHandshakeRequest(text: string): HandshakeRequest | SceneWebSocketError {
  const [requestLine, ...headerLines] = text.split("\r\n");
  const headers = new Map<string, string>();
  for (const line of headerLines) {
    const separator = line.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    headers.set(line.slice(0, separator).trim().toLowerCase(), line.slice(separator + 1).trim());
  }

  const upgrade = headers.get("upgrade");
  if (upgrade === undefined || !upgrade.toLowerCase().includes("websocket")) {
    return new SceneWebSocketError(
      SceneWebSocketErrors.HANDSHAKE_FAILED_ERROR_TYPE,
      "Request is missing an Upgrade: websocket header",
    );
  }
  const key = headers.get("sec-websocket-key");
  if (!key) {
    return new SceneWebSocketError(
      SceneWebSocketErrors.HANDSHAKE_FAILED_ERROR_TYPE,
      "Request is missing a Sec-WebSocket-Key header",
    );
  }
  return { requestLine, headers, key };
}

export function buildHandshakeResponse(acceptKey: string): string {
  return (
    "HTTP/1.1 101 Switching Protocols\r\n" +
    "Connection: Upgrade\r\n" +
    "Upgrade: websocket\r\n" +
    `Sec-WebSocket-Accept: ${acceptKey}\r\n\r\n`
  );
}
