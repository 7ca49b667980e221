import { Hono } from "hono";
import type { Context, Next } from "hono";

import type { RoomRegistry } from "./core.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly registry: RoomRegistry;
  readonly connectionCount: () => number;
}

export function createBackendApp({
  port,
  registry,
  connectionCount,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({
      ok: true,
      timestamp: Date.now(),
      connections: connectionCount(),
      config: { port },
    }),
  );

  app.get("/api/rooms", async (c: Context) => {
    const rooms = await registry.listRooms();
    return c.json({ rooms });
  });

  return app;
}
