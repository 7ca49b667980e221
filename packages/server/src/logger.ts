/* eslint-disable no-console */
import type { Logger } from "./core.js";

type Level = "debug" | "info" | "warn" | "error";

// Errors nested in meta objects lose their message under console formatting.
function serializeMeta(meta: unknown): unknown {
  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message, stack: meta.stack };
  }
  if (typeof meta !== "object" || meta === null || Array.isArray(meta)) {
    return meta;
  }
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [
      key,
      value instanceof Error ? { name: value.name, message: value.message } : value,
    ]),
  );
}

export function createConsoleLogger(
  namespace: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Logger {
  const prefix = `[${namespace}]`;
  const write = (level: Level, message: string, meta: unknown): void => {
    const line = [new Date().toISOString(), level.toUpperCase(), prefix, message];
    if (meta === undefined) {
      console[level](...line);
    } else {
      console[level](...line, serializeMeta(meta));
    }
  };

  return {
    info(message: string, meta?: unknown): void {
      write("info", message, meta);
    },
    warn(message: string, meta?: unknown): void {
      write("warn", message, meta);
    },
    error(message: string, meta?: unknown): void {
      write("error", message, meta);
    },
    debug(message: string, meta?: unknown): void {
      if (env["DEBUG"]) {
        write("debug", message, meta);
      }
    },
  } satisfies Logger;
}
