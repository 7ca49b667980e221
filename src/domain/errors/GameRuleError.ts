import type { PlayerId, RoomId } from "../typedefs.js";

export type GameRuleViolation =
  | "RoomFull"
  | "GameInProgress"
  | "AlreadyStarted"
  | "NotEnoughPlayers"
  | "NoPlayersLeft"
  | "NotInRoom"
  | "NotRoomOwner"
  | "NotDrawer"
  | "GameOver"
  | "PlayerNotFound"
  | "NotStarted"
  | "InvalidScore";

/**
 * A room operation was refused. The room is left exactly as it was before the
 * call, and only the requesting client is told about it.
 */
export class GameRuleError extends Error {
  constructor(
    public readonly code: GameRuleViolation,
    message: string,
  ) {
    super(message);
    this.name = "GameRuleError";
  }

  static roomFull(roomId: RoomId, capacity: number): GameRuleError {
    return new GameRuleError("RoomFull", `Room ${roomId} is full (${capacity} players)`);
  }

  static gameInProgress(roomId: RoomId): GameRuleError {
    return new GameRuleError("GameInProgress", `Room ${roomId} is already playing`);
  }

  static alreadyStarted(roomId: RoomId): GameRuleError {
    return new GameRuleError("AlreadyStarted", `Room ${roomId} has already started`);
  }

  static notEnoughPlayers(required: number, actual: number): GameRuleError {
    return new GameRuleError(
      "NotEnoughPlayers",
      `At least ${required} players are required to start (have ${actual})`,
    );
  }

  static noPlayersLeft(roomId: RoomId): GameRuleError {
    return new GameRuleError(
      "NoPlayersLeft",
      `No scheduled drawer is still present in room ${roomId}`,
    );
  }

  static notInRoom(playerId: PlayerId): GameRuleError {
    return new GameRuleError("NotInRoom", `Player ${playerId} is not in a room`);
  }

  static notRoomOwner(playerId: PlayerId): GameRuleError {
    return new GameRuleError("NotRoomOwner", `Player ${playerId} does not own the room`);
  }

  static notDrawer(playerId: PlayerId): GameRuleError {
    return new GameRuleError("NotDrawer", `Player ${playerId} is not the current drawer`);
  }

  static gameOver(roomId: RoomId): GameRuleError {
    return new GameRuleError("GameOver", `The game in room ${roomId} has ended`);
  }

  static playerNotFound(playerId: PlayerId): GameRuleError {
    return new GameRuleError("PlayerNotFound", `Player not found: ${playerId}`);
  }

  static notStarted(roomId: RoomId): GameRuleError {
    return new GameRuleError("NotStarted", `The game in room ${roomId} has not started`);
  }

  static invalidScore(points: number, max: number): GameRuleError {
    return new GameRuleError(
      "InvalidScore",
      `Score must be a whole number from 1 to ${max} (got ${points})`,
    );
  }
}
