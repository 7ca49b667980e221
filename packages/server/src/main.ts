import { serve } from "@hono/node-server";
import { Server } from "node:http";
import type { AddressInfo } from "node:net";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { SessionHub } from "./adapters/SessionHub.js";
import { createBackendApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { InMemoryRoomRegistry, ShuffledWordSource } from "./core.js";
import type { CommandContext } from "./core.js";
import { Dispatcher } from "./Dispatcher.js";
import { createConsoleLogger } from "./logger.js";
import { attachWebSocketEndpoint } from "./websocket.js";
import { loadWordList } from "./words.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("server");
  const config = loadServerConfig();
  const words = loadWordList(config.wordsFile);

  const registry = new InMemoryRoomRegistry({
    config: config.game,
    createWordSource: (_roomId, seed) => new ShuffledWordSource(words, seed),
    logger,
  });
  const hub = new SessionHub(logger);

  const createContext = (): CommandContext => ({
    registry,
    bus: hub,
    scheduler,
    config: config.game,
    logger,
  });

  const scheduler: RealScheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const dispatcher = new Dispatcher({
    registry,
    hub,
    scheduler,
    config: config.game,
    session: config.session,
    logger,
  });

  const app = createBackendApp({
    port: config.port,
    registry,
    connectionCount: () => dispatcher.connectionCount,
  });

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info: AddressInfo) => {
      logger.info("Server listening", { ...info, words: words.length });
    },
  );

  if (!(server instanceof Server)) {
    throw new Error("WebSocket endpoint needs an HTTP/1.1 server");
  }
  const wss = attachWebSocketEndpoint(server, {
    path: "/ws",
    onConnection: (socket) => {
      dispatcher.accept(socket);
    },
    logger,
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    scheduler.cancelAll();
    void dispatcher
      .shutdown()
      .catch((error: unknown) => logger.error("Shutdown failed", { error }))
      .finally(() => {
        wss.close();
        server.close();
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

void startServer().catch((error) => {
  createConsoleLogger("server").error("Failed to start server", { error });
  process.exit(1);
});
