import type { GuessOutcome } from "../entities/Room.js";
import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance, othersInRoom, publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

/**
 * Chat and guesses share one path: every message is checked against the word
 * first, and only non-matching text is relayed as chat.
 */
export class SubmitChat extends Command<GuessOutcome> {
  readonly type = "SubmitChat" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly text: string,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute(ctx: CommandContext): Promise<GuessOutcome> {
    const { registry, bus, logger } = ctx;

    return registry.withRoom(this.roomId, async (room) => {
      const outcome = room.recordGuess(this.playerId, this.text);
      const sender = room.player(this.playerId);

      switch (outcome.kind) {
        case "incorrect": {
          bus.publish(
            othersInRoom(room, this.playerId),
            createMessage(MessageType.Chat, {
              by: this.playerId,
              by_name: sender?.displayName ?? "",
              message: this.text,
            }),
          );
          break;
        }

        case "withheld": {
          logger?.debug?.("Word withheld from chat", {
            roomId: room.id,
            playerId: this.playerId,
          });
          break;
        }

        case "correct": {
          bus.publish(
            room.memberIds(),
            createMessage(MessageType.GuessCorrect, {
              player_id: this.playerId,
              player_name: sender?.displayName ?? "",
              points: outcome.points,
            }),
          );

          logger?.info?.("Correct guess", {
            type: this.type,
            roomId: room.id,
            playerId: this.playerId,
            roundNumber: room.roundNumber,
            at: this.at,
          });

          if (outcome.roundComplete) {
            await announceAdvance(room, room.advanceOrFinish(), ctx);
          } else {
            publishRoomUpdate(room, ctx);
          }
          break;
        }
      }

      return outcome;
    });
  }
}
