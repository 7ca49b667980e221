import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type WebSocket } from "ws";

import type { Logger } from "./core.js";

export interface WebSocketEndpointOptions {
  readonly path: string;
  readonly onConnection: (socket: WebSocket) => void;
  readonly logger?: Logger;
}

/**
 * Serves WebSocket upgrades on `path`. Text frames are not UTF-8 validated by
 * `ws`: invalid bytes reach the codec, which substitutes U+FFFD instead of
 * the connection being closed with 1007.
 */
export function attachWebSocketEndpoint(
  server: Server,
  options: WebSocketEndpointOptions,
): WebSocketServer {
  const { path, onConnection, logger } = options;
  const wss = new WebSocketServer({ noServer: true, skipUTF8Validation: true });

  server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const { pathname } = parseRequestUrl(request);
    if (pathname !== path) {
      logger?.warn("Invalid upgrade path", { path: pathname });
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  wss.on("connection", (ws: WebSocket) => onConnection(ws));
  return wss;
}

function parseRequestUrl(request: IncomingMessage): URL {
  return new URL(request.url ?? "/", `http://${request.headers.host ?? "localhost"}`);
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}
