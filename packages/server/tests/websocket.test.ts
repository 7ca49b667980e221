import { createServer, type Server } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocket, type RawData, type WebSocketServer } from "ws";

import { SessionHub } from "../src/adapters/SessionHub.js";
import {
  InMemoryRoomRegistry,
  ShuffledWordSource,
  createGameConfig,
  type Logger,
  type Scheduler,
} from "../src/core.js";
import { Dispatcher } from "../src/Dispatcher.js";
import { attachWebSocketEndpoint } from "../src/websocket.js";

interface Endpoint {
  readonly server: Server;
  readonly wss: WebSocketServer;
  readonly dispatcher: Dispatcher;
  readonly url: string;
}

let endpoint: Endpoint | undefined;

async function startEndpoint(): Promise<Endpoint> {
  const config = createGameConfig();
  const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const scheduler: Scheduler = {
    scheduleRoundTimeout: vi.fn(async () => undefined),
    cancel: vi.fn(async () => undefined),
  };
  const dispatcher = new Dispatcher({
    registry: new InMemoryRoomRegistry({
      config,
      createWordSource: (_roomId, seed) => new ShuffledWordSource(["apple"], seed),
    }),
    hub: new SessionHub(),
    scheduler,
    config,
    session: { outboundQueueLimit: 16, maxConsecutiveDecodeFailures: 3, idleTimeoutMs: 0 },
    logger,
    generatePlayerId: () => "player-1",
  });

  const server = createServer();
  const wss = attachWebSocketEndpoint(server, {
    path: "/ws",
    onConnection: (socket) => {
      dispatcher.accept(socket);
    },
    logger,
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }

  return { server, wss, dispatcher, url: `ws://127.0.0.1:${address.port}` };
}

function openClient(url: string): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const client = new WebSocket(url);
    client.once("open", () => resolve(client));
    client.once("error", reject);
  });
}

function nextMessage(client: WebSocket): Promise<unknown> {
  return new Promise((resolve) => {
    client.once("message", (data: RawData) => resolve(JSON.parse(data.toString())));
  });
}

afterEach(async () => {
  if (!endpoint) return;
  const { server, wss, dispatcher } = endpoint;
  endpoint = undefined;
  await dispatcher.shutdown();
  wss.close();
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("WebSocket endpoint", () => {
  it("decodes invalid UTF-8 in a text frame instead of dropping the connection", async () => {
    endpoint = await startEndpoint();
    const client = await openClient(`${endpoint.url}/ws`);
    const reply = nextMessage(client);

    const frame = Buffer.concat([
      Buffer.from('{"type":"connect","data":{"username":"A'),
      Buffer.from([0xe4, 0xbd]),
      Buffer.from('"}}'),
    ]);
    client.send(frame, { binary: false });

    await expect(reply).resolves.toEqual({
      type: "connect_response",
      data: { success: true, player_id: "player-1", message: "Welcome, A\uFFFD" },
    });
    expect(client.readyState).toBe(WebSocket.OPEN);
    client.terminate();
  });

  it("refuses upgrades on other paths", async () => {
    endpoint = await startEndpoint();

    await expect(openClient(`${endpoint.url}/other`)).rejects.toThrow(
      "Unexpected server response: 404",
    );
  });
});
