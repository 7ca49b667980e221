import type { Message } from "../protocol/messages.js";
import type { PlayerId } from "../typedefs.js";

/**
 * Outbound delivery to connected players. Implementations only enqueue; they
 * never wait for a client, so callers may publish while holding a room lock.
 */
export interface MessageBus {
  send(playerId: PlayerId, message: Message): void;
  publish(playerIds: readonly PlayerId[], message: Message): void;
}
