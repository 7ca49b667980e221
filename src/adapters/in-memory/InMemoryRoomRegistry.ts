/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { webcrypto } from "node:crypto";

import { Room } from "../../domain/entities/Room.js";
import { assertValidRoom } from "../../domain/entities/RoomRules.js";
import { RoomNotFoundError } from "../../domain/errors/RoomNotFoundError.js";
import { roomSettingsFrom, type GameConfig } from "../../domain/GameConfig.js";
import type { RoomSummary } from "../../domain/protocol/messages.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { RoomRegistry } from "../../domain/ports/RoomRegistry.js";
import type { WordSource } from "../../domain/ports/WordSource.js";
import type { RoomId } from "../../domain/typedefs.js";
import { Mutex } from "./Mutex.js";

interface RoomEntry {
  readonly room: Room;
  readonly lock: Mutex;
}

export interface InMemoryRoomRegistryOptions {
  readonly config: GameConfig;
  readonly createWordSource: (roomId: RoomId, seed: number) => WordSource;
  readonly nextSeed?: () => number;
  readonly logger?: Logger;
}

function randomSeed(): number {
  const seedBuffer = new Uint32Array(1);
  webcrypto.getRandomValues(seedBuffer);
  return seedBuffer[0] ?? 0;
}

export class InMemoryRoomRegistry implements RoomRegistry {
  #rooms = new Map<RoomId, RoomEntry>();
  // Guards the room list only; never held while waiting on a room lock from withRoom.
  readonly #listLock = new Mutex();
  readonly #options: InMemoryRoomRegistryOptions;
  #nextId = 1;

  constructor(options: InMemoryRoomRegistryOptions) {
    this.#options = options;
  }

  get size(): number {
    return this.#rooms.size;
  }

  has(roomId: RoomId): boolean {
    return this.#rooms.has(roomId);
  }

  async getOrCreate(roomId?: RoomId): Promise<RoomId> {
    return this.#listLock.runExclusive(() => {
      if (roomId !== undefined) {
        if (!this.#rooms.has(roomId)) this.#create(roomId);
        return roomId;
      }

      // Empty rooms are about to be collected; matchmaking only reuses occupied ones.
      for (const [id, { room }] of this.#rooms) {
        if (room.status === "waiting" && room.hasSpareCapacity && room.playerCount > 0) {
          return id;
        }
      }
      return this.#create(this.#generateId());
    });
  }

  async withRoom<T>(roomId: RoomId, fn: (room: Room) => T | Promise<T>): Promise<T> {
    const entry = this.#rooms.get(roomId);
    if (!entry) throw new RoomNotFoundError(roomId);

    return entry.lock.runExclusive(async () => {
      if (this.#rooms.get(roomId) !== entry) throw new RoomNotFoundError(roomId);
      const result = await fn(entry.room);
      assertValidRoom(entry.room);
      return result;
    });
  }

  async removeIfEmpty(roomId: RoomId): Promise<boolean> {
    return this.#listLock.runExclusive(async () => {
      const entry = this.#rooms.get(roomId);
      if (!entry) return false;

      return entry.lock.runExclusive(() => {
        if (entry.room.playerCount > 0) return false;
        this.#rooms.delete(roomId);
        this.#options.logger?.info?.("Room removed", { roomId });
        return true;
      });
    });
  }

  async listRooms(): Promise<RoomSummary[]> {
    return this.#listLock.runExclusive(() =>
      [...this.#rooms.values()].map(({ room }) => ({
        room_id: room.id,
        player_count: room.playerCount,
        max_players: room.settings.maxPlayers,
        status: room.status,
      })),
    );
  }

  #create(roomId: RoomId): RoomId {
    const { config, createWordSource, nextSeed = randomSeed } = this.#options;
    const seed = nextSeed();
    const room = new Room(roomId, {
      settings: roomSettingsFrom(config),
      rules: {
        minPlayers: config.minPlayers,
        guessPoints: config.guessPoints,
        drawerBonus: config.drawerBonus,
        maxGivenScore: config.maxGivenScore,
      },
      words: createWordSource(roomId, seed),
      seed,
    });
    this.#rooms.set(roomId, { room, lock: new Mutex() });
    this.#options.logger?.info?.("Room created", { roomId, seed });
    return roomId;
  }

  #generateId(): RoomId {
    let id: RoomId;
    do {
      id = `room-${this.#nextId++}`;
    } while (this.#rooms.has(id));
    return id;
  }
}
