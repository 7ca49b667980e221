export type {
  Command,
  CommandContext,
} from "@draw-and-guess/core/domain/commands/Command.js";
export { ConfigureRoom } from "@draw-and-guess/core/domain/commands/ConfigureRoom.js";
export { GiveScore } from "@draw-and-guess/core/domain/commands/GiveScore.js";
export { JoinRoom } from "@draw-and-guess/core/domain/commands/JoinRoom.js";
export { KickPlayer } from "@draw-and-guess/core/domain/commands/KickPlayer.js";
export { LeaveRoom } from "@draw-and-guess/core/domain/commands/LeaveRoom.js";
export { NextRound } from "@draw-and-guess/core/domain/commands/NextRound.js";
export { RelayDrawing } from "@draw-and-guess/core/domain/commands/RelayDrawing.js";
export { RoundTimeout } from "@draw-and-guess/core/domain/commands/RoundTimeout.js";
export { StartGame } from "@draw-and-guess/core/domain/commands/StartGame.js";
export { SubmitChat } from "@draw-and-guess/core/domain/commands/SubmitChat.js";
export { dispatchCommand } from "@draw-and-guess/core/domain/commands/dispatchCommand.js";
export type { GuessOutcome } from "@draw-and-guess/core/domain/entities/Room.js";
export {
  GameCommandInputError,
  GameRuleError,
  NotConnectedError,
  ProtocolError,
  RoomNotFoundError,
} from "@draw-and-guess/core/domain/errors/index.js";
export type { GameConfig } from "@draw-and-guess/core/domain/GameConfig.js";
export { createGameConfig } from "@draw-and-guess/core/domain/GameConfig.js";
export {
  decodeMessage,
  encodeMessage,
} from "@draw-and-guess/core/domain/protocol/MessageCodec.js";
export {
  createMessage,
  MessageType,
  type Message,
  type RoomSummary,
} from "@draw-and-guess/core/domain/protocol/messages.js";
export {
  readChatText,
  readConnect,
  readDrawStroke,
  readGiveScore,
  readJoinRoom,
  readKickTarget,
  readRoomSettings,
} from "@draw-and-guess/core/domain/protocol/payloads.js";
export type { Logger } from "@draw-and-guess/core/domain/ports/Logger.js";
export type { MessageBus } from "@draw-and-guess/core/domain/ports/MessageBus.js";
export type { RoomRegistry } from "@draw-and-guess/core/domain/ports/RoomRegistry.js";
export type { Scheduler } from "@draw-and-guess/core/domain/ports/Scheduler.js";
export type { WordSource } from "@draw-and-guess/core/domain/ports/WordSource.js";
export type {
  PlayerId,
  RoomId,
  TimePoint,
} from "@draw-and-guess/core/domain/typedefs.js";
export { InMemoryRoomRegistry } from "@draw-and-guess/core/adapters/in-memory/InMemoryRoomRegistry.js";
export { ShuffledWordSource } from "@draw-and-guess/core/adapters/in-memory/ShuffledWordSource.js";
