import type { RoomSettings } from "../GameConfig.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

export class ConfigureRoom extends Command<RoomSettings> {
  readonly type = "ConfigureRoom" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly patch: Partial<RoomSettings>,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute(ctx: CommandContext): Promise<RoomSettings> {
    return ctx.registry.withRoom(this.roomId, (room) => {
      const settings = room.configure(this.playerId, this.patch);
      publishRoomUpdate(room, ctx);
      ctx.logger?.info?.("Room configured", { roomId: room.id, settings, at: this.at });
      return settings;
    });
  }
}
