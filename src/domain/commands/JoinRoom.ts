import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { RoomNotFoundError } from "../errors/RoomNotFoundError.js";
import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId, RoomId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { publishRoomUpdate } from "./RoomBroadcasts.js";
import { assertIdentifiers } from "./validation.js";

// A matched room can be collected between lookup and join; retry with a fresh lookup.
const MAX_ATTEMPTS = 3;

export class JoinRoom extends Command<RoomId> {
  readonly type = "JoinRoom" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly displayName: string,
    public readonly roomId: RoomId | undefined,
    public readonly at: TimePoint,
  ) {
    super();

    assertIdentifiers(playerId, roomId);
    if (displayName.trim().length === 0) {
      throw GameCommandInputError.because(["Display name must not be empty"]);
    }
  }

  async execute(ctx: CommandContext): Promise<RoomId> {
    const { registry, bus, logger } = ctx;

    for (let attempt = 1; ; attempt += 1) {
      const roomId = await registry.getOrCreate(this.roomId);

      try {
        await registry.withRoom(roomId, (room) => {
          room.join(this.playerId, this.displayName);
          bus.send(this.playerId, createMessage(MessageType.RoomJoined, { room_id: roomId }));
          publishRoomUpdate(room, ctx);
        });
      } catch (error) {
        if (error instanceof RoomNotFoundError && attempt < MAX_ATTEMPTS) {
          logger?.debug?.("Room vanished before join; retrying", { roomId, attempt });
          continue;
        }
        // Do not leave behind a room created only for a rejected join.
        await registry.removeIfEmpty(roomId);
        throw error;
      }

      logger?.info?.("Player joined room", {
        type: this.type,
        roomId,
        playerId: this.playerId,
        at: this.at,
      });
      return roomId;
    }
  }
}
