import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PlayerId, RoomId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidPlayerId(id: unknown): id is PlayerId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function isValidRoomId(id: unknown): id is RoomId {
  return typeof id === "string" && id.length > 0 && id.length <= 64;
}

export function assertIdentifiers(playerId: unknown, roomId?: unknown): void {
  const issues: string[] = [];
  if (!isValidPlayerId(playerId)) {
    issues.push("Player identifier must be a non-empty string without whitespace");
  }
  if (roomId !== undefined && !isValidRoomId(roomId)) {
    issues.push("Room identifier must be a non-empty string of at most 64 characters");
  }
  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}
