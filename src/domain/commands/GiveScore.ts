import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

/** The current drawer awards extra points to another member of the room. */
export class GiveScore extends Command<number> {
  readonly type = "GiveScore" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly targetId: PlayerId,
    public readonly points: number,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
    assertIdentifiers(targetId);
  }

  async execute(ctx: CommandContext): Promise<number> {
    const { registry, bus, logger } = ctx;

    return registry.withRoom(this.roomId, (room) => {
      const score = room.giveScore(this.playerId, this.targetId, this.points);

      publishRoomUpdate(room, ctx);
      bus.publish(
        room.memberIds(),
        createMessage(MessageType.ScoreGiven, {
          player_id: this.targetId,
          player_name: room.player(this.targetId)?.displayName ?? "",
          score: this.points,
          by: this.playerId,
        }),
      );

      logger?.info?.("Score given", {
        type: this.type,
        roomId: room.id,
        playerId: this.targetId,
        by: this.playerId,
        points: this.points,
        at: this.at,
      });
      return score;
    });
  }
}
