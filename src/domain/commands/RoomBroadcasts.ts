import type { Room, RoundAdvance } from "../entities/Room.js";
import { createMessage, MessageType } from "../protocol/messages.js";
import type { PlayerId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

type BroadcastContext = Pick<CommandContext, "bus" | "scheduler" | "logger">;

/**
 * Sends every member its own `room_update`. Each payload is projected for its
 * recipient, so only the drawer's copy carries the word.
 */
export function publishRoomUpdate(room: Room, { bus }: Pick<CommandContext, "bus">): void {
  for (const memberId of room.memberIds()) {
    bus.send(memberId, createMessage(MessageType.RoomUpdate, room.viewFor(memberId)));
  }
}

export function othersInRoom(room: Room, playerId: PlayerId): PlayerId[] {
  return room.memberIds().filter((memberId) => memberId !== playerId);
}

/**
 * Announces a rotation step: the end of the previous round (if any), the new
 * room state, then either the next round or the final ranking. Also keeps the
 * round timer in step with the room.
 */
export async function announceAdvance(
  room: Room,
  advance: RoundAdvance,
  ctx: BroadcastContext,
): Promise<void> {
  const { bus, scheduler, logger } = ctx;
  const members = room.memberIds();

  if (advance.previous) {
    bus.publish(
      members,
      createMessage(MessageType.RoundEnd, {
        round_number: advance.previous.roundNumber,
        drawer_id: advance.previous.drawerId,
        word: advance.previous.word,
      }),
    );
  }

  publishRoomUpdate(room, ctx);

  if (advance.kind === "ended") {
    await scheduler.cancel(room.id);
    bus.publish(members, createMessage(MessageType.GameResult, { ranking: advance.ranking }));
    logger?.info?.("Game ended", { roomId: room.id, ranking: advance.ranking });
    return;
  }

  const { round } = advance;
  bus.publish(
    members,
    createMessage(MessageType.RoundStart, {
      round_number: round.roundNumber,
      drawer_id: round.drawerId,
      drawer_name: round.drawerName,
      total_rounds: round.totalRounds,
    }),
  );

  const { roundDurationMs } = room.settings;
  if (roundDurationMs > 0) {
    await scheduler.scheduleRoundTimeout(room.id, round.roundNumber, roundDurationMs);
  }

  logger?.info?.("Round started", {
    roomId: room.id,
    roundNumber: round.roundNumber,
    drawerId: round.drawerId,
  });
}
