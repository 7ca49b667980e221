import type { RoomSettings } from "../GameConfig.js";
import type { RoomView } from "../protocol/messages.js";
import type { Player, PlayerId, RoomId, RoomStatus } from "../typedefs.js";

/** Word-free picture of a room; safe to share between recipients. */
export interface RoomSnapshot {
  readonly id: RoomId;
  readonly ownerId: PlayerId | undefined;
  readonly status: RoomStatus;
  readonly players: readonly Readonly<Player>[];
  readonly roundNumber: number;
  readonly totalRounds: number;
  readonly drawerId: PlayerId | undefined;
  readonly settings: Readonly<RoomSettings>;
}

/**
 * Builds the `room_update` payload for one recipient. `visibleWord` must come
 * from `Room.visibleWordFor(recipient)`; `current_word` is omitted when it is
 * undefined.
 */
export function projectRoomView(
  snapshot: RoomSnapshot,
  visibleWord: string | undefined,
): RoomView {
  return {
    room_id: snapshot.id,
    owner_id: snapshot.ownerId ?? null,
    status: snapshot.status,
    players: snapshot.players.map((player) => ({
      id: player.id,
      name: player.displayName,
      score: player.score,
      is_drawer: player.isDrawer,
      is_ready: player.isReady,
    })),
    round_number: snapshot.roundNumber,
    total_rounds: snapshot.totalRounds,
    drawer_id: snapshot.drawerId ?? null,
    max_players: snapshot.settings.maxPlayers,
    round_time: Math.round(snapshot.settings.roundDurationMs / 1000),
    rest_time: Math.round(snapshot.settings.restDurationMs / 1000),
    ...(visibleWord !== undefined ? { current_word: visibleWord } : {}),
  };
}
