/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { encodeMessage } from "../core.js";
import type { Logger, Message, MessageBus, PlayerId } from "../core.js";
import type { Session } from "../session/Session.js";

/** Routes outbound messages to the session that currently speaks for each player. */
export class SessionHub implements MessageBus {
  #sessions: Map<PlayerId, Session> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  get size(): number {
    return this.#sessions.size;
  }

  attach(playerId: PlayerId, session: Session): void {
    this.#sessions.set(playerId, session);
    this.#logger?.debug?.("Session attached", { playerId, sessionId: session.id });
  }

  /** Detaches only if `session` is still the one registered for the player. */
  detach(playerId: PlayerId, session: Session): void {
    if (this.#sessions.get(playerId) === session) {
      this.#sessions.delete(playerId);
      this.#logger?.debug?.("Session detached", { playerId, sessionId: session.id });
    }
  }

  send(playerId: PlayerId, message: Message): void {
    this.#deliver(playerId, encodeMessage(message), message.type);
  }

  publish(playerIds: readonly PlayerId[], message: Message): void {
    if (playerIds.length === 0) return;
    const frame = encodeMessage(message);
    for (const playerId of playerIds) {
      this.#deliver(playerId, frame, message.type);
    }
  }

  #deliver(playerId: PlayerId, frame: Uint8Array, type: string): void {
    const session = this.#sessions.get(playerId);
    if (!session) {
      this.#logger?.debug?.("No session for recipient", { playerId, type });
      return;
    }
    if (!session.sendFrame(frame)) {
      this.#logger?.warn?.("Failed to deliver event", { playerId, type });
    }
  }
}
