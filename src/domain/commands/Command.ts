import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RoomRegistry } from "../ports/RoomRegistry.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly registry: RoomRegistry;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
