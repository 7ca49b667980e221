import type { Room } from "../entities/Room.js";
import type { RoomSummary } from "../protocol/messages.js";
import type { RoomId } from "../typedefs.js";

/**
 * Directory of live rooms. `withRoom` is the only sanctioned way to touch a
 * room: it holds that room's exclusive lock for the whole callback, which
 * gives each room a total order over its operations.
 */
export interface RoomRegistry {
  /**
   * Returns `roomId`, creating the room when it does not exist. Without an id,
   * returns the first waiting room with spare capacity, or a new room.
   */
  getOrCreate(roomId?: RoomId): Promise<RoomId>;

  /** Fails with `RoomNotFoundError` when the room no longer exists. */
  withRoom<T>(roomId: RoomId, fn: (room: Room) => T | Promise<T>): Promise<T>;

  /** Drops the room when it has no players; resolves to whether it was dropped. */
  removeIfEmpty(roomId: RoomId): Promise<boolean>;

  listRooms(): Promise<RoomSummary[]>;
}
