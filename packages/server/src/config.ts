import { fileURLToPath } from "node:url";

import { createGameConfig, type GameConfig } from "./core.js";
import type { SessionOptions } from "./session/Session.js";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly game: GameConfig;
  readonly session: Omit<SessionOptions, "logger">;
  readonly wordsFile: string;
}

type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_WORDS_FILE = fileURLToPath(new URL("../data/words.json", import.meta.url));

/** `min` is 0 for durations where 0 switches the feature off, 1 for counts. */
function readNumber(env: Env, key: string, fallback: number, min = 1): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function readOptionalNumber(env: Env, key: string, min = 1): number | undefined {
  const value = readNumber(env, key, -1, min);
  return value < 0 ? undefined : value;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const maxPlayers = readOptionalNumber(env, "MAX_PLAYERS");
  const roundsPerPlayer = readOptionalNumber(env, "ROUNDS_PER_PLAYER");
  const roundDurationMs = readOptionalNumber(env, "ROUND_TIME_MS", 0);
  const restDurationMs = readOptionalNumber(env, "REST_TIME_MS", 0);

  return {
    port: readNumber(env, "PORT", 8787),
    host: env["HOST"] ?? "0.0.0.0",
    game: createGameConfig({
      ...(maxPlayers !== undefined ? { maxPlayers } : {}),
      ...(roundsPerPlayer !== undefined ? { roundsPerPlayer } : {}),
      ...(roundDurationMs !== undefined ? { roundDurationMs } : {}),
      ...(restDurationMs !== undefined ? { restDurationMs } : {}),
    }),
    session: {
      idleTimeoutMs: readNumber(env, "IDLE_TIMEOUT_MS", 300_000, 0),
      outboundQueueLimit: readNumber(env, "OUTBOUND_QUEUE_LIMIT", 256),
      maxConsecutiveDecodeFailures: readNumber(env, "MAX_DECODE_FAILURES", 5),
    },
    wordsFile: env["WORDS_FILE"] ?? DEFAULT_WORDS_FILE,
  };
}
