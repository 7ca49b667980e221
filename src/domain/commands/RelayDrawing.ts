import { createMessage, MessageType, type DrawStroke } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { othersInRoom } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

export class RelayDrawing extends Command {
  readonly type = "RelayDrawing" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly stroke: DrawStroke,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute({ registry, bus }: CommandContext): Promise<void> {
    await registry.withRoom(this.roomId, (room) => {
      room.assertCanDraw(this.playerId);
      bus.publish(
        othersInRoom(room, this.playerId),
        createMessage(MessageType.Draw, { by: this.playerId, ...this.stroke }),
      );
    });
  }
}
