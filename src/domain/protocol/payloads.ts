import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PlayerId, RoomId } from "../typedefs.js";
import type { DrawAction, DrawStroke, MessageData } from "./messages.js";

const DRAW_ACTIONS: readonly DrawAction[] = ["draw", "erase", "clear"];
const MAX_CHAT_LENGTH = 500;

export interface ConnectPayload {
  readonly username: string;
  readonly version: string | undefined;
}

export interface RoomSettingsPayload {
  readonly roundsPerPlayer?: number;
  readonly roundDurationMs?: number;
  readonly restDurationMs?: number;
  readonly maxPlayers?: number;
}

export interface GiveScorePayload {
  readonly targetId: PlayerId;
  readonly points: number;
}

function optionalString(
  data: MessageData,
  key: string,
  issues: string[],
): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    issues.push(`${key} must be a string`);
    return undefined;
  }
  return value;
}

function optionalNumber(
  data: MessageData,
  key: string,
  issues: string[],
): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    issues.push(`${key} must be a finite number`);
    return undefined;
  }
  return value;
}

function characterCount(text: string): number {
  return [...text].length;
}

function raise(issues: readonly string[]): void {
  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}

export function readConnect(data: MessageData, maxNameLength: number): ConnectPayload {
  const issues: string[] = [];
  const username = optionalString(data, "username", issues)?.trim() ?? "";
  const version = optionalString(data, "version", issues);

  if (username.length === 0) {
    issues.push("username is required");
  } else if (characterCount(username) > maxNameLength) {
    issues.push(`username must be at most ${maxNameLength} characters`);
  }

  raise(issues);
  return { username, version };
}

export function readJoinRoom(data: MessageData): { readonly roomId: RoomId | undefined } {
  const issues: string[] = [];
  const raw = data["room_id"];
  // Older clients send numeric room ids.
  const roomId =
    typeof raw === "number" && Number.isInteger(raw)
      ? String(raw)
      : optionalString(data, "room_id", issues)?.trim();
  raise(issues);
  return { roomId: roomId === "" ? undefined : roomId };
}

/** Reads chat text from `message`, falling back to `word` (guess) and `text`. */
export function readChatText(data: MessageData): string {
  const issues: string[] = [];
  const text =
    optionalString(data, "message", issues) ??
    optionalString(data, "word", issues) ??
    optionalString(data, "text", issues);

  if (text === undefined || text.trim().length === 0) {
    issues.push("message is required");
  } else if (characterCount(text) > MAX_CHAT_LENGTH) {
    issues.push(`message must be at most ${MAX_CHAT_LENGTH} characters`);
  }

  raise(issues);
  return text ?? "";
}

export function readDrawStroke(data: MessageData): DrawStroke {
  const issues: string[] = [];
  const action = data["action"];
  if (typeof action !== "string" || !DRAW_ACTIONS.some((known) => known === action)) {
    issues.push(`action must be one of ${DRAW_ACTIONS.join(", ")}`);
    raise(issues);
  }

  const x = optionalNumber(data, "x", issues);
  const y = optionalNumber(data, "y", issues);
  const size = optionalNumber(data, "size", issues);
  const color = readColor(data["color"], issues);
  const parsedAction = DRAW_ACTIONS.find((known) => known === action) ?? "clear";

  if (parsedAction !== "clear" && (x === undefined || y === undefined)) {
    issues.push("x and y are required for draw and erase");
  }
  if (size !== undefined && size <= 0) {
    issues.push("size must be positive");
  }

  raise(issues);
  return {
    action: parsedAction,
    ...(x !== undefined ? { x } : {}),
    ...(y !== undefined ? { y } : {}),
    ...(color !== undefined ? { color } : {}),
    ...(size !== undefined ? { size } : {}),
  };
}

function readColor(
  value: unknown,
  issues: string[],
): string | readonly number[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (
    Array.isArray(value) &&
    value.length >= 3 &&
    value.length <= 4 &&
    value.every((channel) => typeof channel === "number" && channel >= 0 && channel <= 255)
  ) {
    return value.filter((channel): channel is number => typeof channel === "number");
  }
  issues.push("color must be a string or an RGB(A) array");
  return undefined;
}

/** Ignores non-positive and non-integer values, as the lobby settings panel sends blanks as 0. */
export function readRoomSettings(data: MessageData): RoomSettingsPayload {
  const issues: string[] = [];
  const maxRounds = optionalNumber(data, "max_rounds", issues);
  const roundTime = optionalNumber(data, "round_time", issues);
  const restTime = optionalNumber(data, "rest_time", issues);
  const maxPlayers = optionalNumber(data, "max_players", issues);
  raise(issues);

  const usable = (value: number | undefined): value is number =>
    value !== undefined && Number.isInteger(value) && value > 0;

  return {
    ...(usable(maxRounds) ? { roundsPerPlayer: maxRounds } : {}),
    ...(usable(roundTime) ? { roundDurationMs: roundTime * 1000 } : {}),
    ...(usable(restTime) ? { restDurationMs: restTime * 1000 } : {}),
    ...(usable(maxPlayers) ? { maxPlayers } : {}),
  };
}

export function readKickTarget(data: MessageData): PlayerId {
  const issues: string[] = [];
  const target = optionalString(data, "player_id", issues)?.trim() ?? "";
  if (target.length === 0) issues.push("player_id is required");
  raise(issues);
  return target;
}

export function readGiveScore(data: MessageData): GiveScorePayload {
  const issues: string[] = [];
  const targetId = optionalString(data, "player_id", issues)?.trim() ?? "";
  const points = optionalNumber(data, "score", issues);
  if (targetId.length === 0) issues.push("player_id is required");
  if (data["score"] === undefined || data["score"] === null) {
    issues.push("score is required");
  } else if (points !== undefined && !Number.isInteger(points)) {
    issues.push("score must be a whole number");
  }
  raise(issues);
  return { targetId, points: points ?? 0 };
}
