import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance, publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

export class KickPlayer extends Command {
  readonly type = "KickPlayer" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly targetId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
    assertIdentifiers(targetId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, bus, logger } = ctx;

    await registry.withRoom(this.roomId, async (room) => {
      const outcome = room.kick(this.playerId, this.targetId);

      bus.send(this.targetId, createMessage(MessageType.Kicked, { room_id: room.id }));
      if (outcome.advance) {
        await announceAdvance(room, outcome.advance, ctx);
      } else {
        publishRoomUpdate(room, ctx);
      }

      logger?.info?.("Player kicked", {
        type: this.type,
        roomId: room.id,
        playerId: this.targetId,
        by: this.playerId,
        at: this.at,
      });
    });
  }
}
