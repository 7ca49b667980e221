import type { RoomId } from "../typedefs.js";

/**
 * Delivers round timeouts to the domain.
 *
 * At most one timeout per room is pending: scheduling replaces the previous
 * one. Implementations dispatch a `RoundTimeout` command when it fires.
 */
export interface Scheduler {
  scheduleRoundTimeout(roomId: RoomId, roundNumber: number, delayMs: number): Promise<void>;
  cancel(roomId: RoomId): Promise<void>;
}
