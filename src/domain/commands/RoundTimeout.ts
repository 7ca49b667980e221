import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import type { RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { announceAdvance } from "./RoomBroadcasts.js";

export class RoundTimeout extends Command {
  readonly type = "RoundTimeout" as const;

  constructor(
    public readonly roomId: RoomId,
    public readonly roundNumber: number,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, logger } = ctx;

    try {
      await registry.withRoom(this.roomId, async (room) => {
        if (room.status !== "playing" || room.roundNumber !== this.roundNumber) {
          logger?.debug?.("Stale round timeout ignored", {
            roomId: this.roomId,
            roundNumber: this.roundNumber,
            current: room.roundNumber,
          });
          return;
        }

        logger?.info?.("Round timed out", {
          type: this.type,
          roomId: room.id,
          roundNumber: this.roundNumber,
          at: this.at,
        });
        await announceAdvance(room, room.advanceOrFinish(), ctx);
      });
    } catch (error) {
      if (error instanceof RoomNotFoundError) return;
      throw error;
    }
  }
}
