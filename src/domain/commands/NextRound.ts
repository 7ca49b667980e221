import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

/** Ends the current round early; allowed for the room owner and the drawer. */
export class NextRound extends Command {
  readonly type = "NextRound" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly roomId: RoomId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers(playerId, roomId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    await ctx.registry.withRoom(this.roomId, async (room) => {
      const advance = room.endRoundBy(this.playerId);
      await announceAdvance(room, advance, ctx);
    });
  }
}
