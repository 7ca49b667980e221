import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

export class StartGame extends Command {
  readonly type = "StartGame" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, logger } = ctx;

    await registry.withRoom(this.roomId, async (room) => {
      const advance = room.start(this.playerId);

      logger?.info?.("Game started", {
        type: this.type,
        roomId: room.id,
        playerId: this.playerId,
        drawerOrder: room.drawerOrder,
        at: this.at,
      });

      await announceAdvance(room, advance, ctx);
    });
  }
}
