/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { CommandContext, Logger, RoomId, Scheduler } from "../core.js";
import { RoundTimeout, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

export class RealScheduler implements Scheduler {
  #timers: Map<RoomId, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
  }

  get pending(): number {
    return this.#timers.size;
  }

  async scheduleRoundTimeout(
    roomId: RoomId,
    roundNumber: number,
    delayMs: number,
  ): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    this.#clear(roomId);

    const timer = setTimeout(async () => {
      this.#timers.delete(roomId);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new RoundTimeout(roomId, roundNumber, Date.now()), context);
      } catch (error) {
        this.#logger?.error?.("Failed to dispatch scheduled timeout", {
          roomId,
          roundNumber,
          error,
        });
      }
    }, delayMs);
    timer.unref?.();

    this.#timers.set(roomId, timer);
    this.#logger?.debug?.("Timeout scheduled", { roomId, roundNumber, delayMs });
  }

  async cancel(roomId: RoomId): Promise<void> {
    this.#clear(roomId);
  }

  cancelAll(): void {
    for (const timer of this.#timers.values()) clearTimeout(timer);
    this.#timers.clear();
  }

  #clear(roomId: RoomId): void {
    const existing = this.#timers.get(roomId);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(roomId);
    }
  }
}
