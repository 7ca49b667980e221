import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance, publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

export type LeaveReason = "left" | "disconnected";

export class LeaveRoom extends Command {
  readonly type = "LeaveRoom" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly reason: LeaveReason,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, bus, scheduler, logger } = ctx;

    try {
      await registry.withRoom(this.roomId, async (room) => {
        const outcome = room.leave(this.playerId);
        if (!outcome.removed) return;

        if (this.reason === "left") {
          bus.send(this.playerId, createMessage(MessageType.RoomLeft, { room_id: room.id }));
        }

        if (outcome.advance) {
          await announceAdvance(room, outcome.advance, ctx);
        } else {
          publishRoomUpdate(room, ctx);
        }

        logger?.info?.("Player left room", {
          type: this.type,
          roomId: room.id,
          playerId: this.playerId,
          reason: this.reason,
          wasDrawer: outcome.wasDrawer,
          at: this.at,
        });
      });
    } catch (error) {
      if (error instanceof RoomNotFoundError) {
        logger?.debug?.("Leave ignored; room already gone", { roomId: this.roomId });
        return;
      }
      throw error;
    }

    if (await registry.removeIfEmpty(this.roomId)) {
      await scheduler.cancel(this.roomId);
    }
  }
}
