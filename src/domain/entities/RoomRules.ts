import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import type { PlayerId } from "../typedefs.js";
import type { Room } from "./Room.js";

export function mulberry32(seed: number) {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomPermutation(n: number, rng: () => number): number[] {
  const permutation = Array.from({ length: n }, (_, index) => index);
  for (let i = n - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    // eslint-disable-next-line @typescript-eslint/no-non-null-assertion
    [permutation[i], permutation[j]] = [permutation[j]!, permutation[i]!];
  }
  return permutation;
}

export function shuffle<T>(items: readonly T[], rng: () => number): T[] {
  return randomPermutation(items.length, rng).flatMap((index) => {
    const item = items[index];
    return item === undefined ? [] : [item];
  });
}

/**
 * Builds the full drawing schedule: `blocks` independent permutations of the
 * players, concatenated. Each block lets every player draw exactly once.
 */
export function buildDrawerOrder(
  players: readonly PlayerId[],
  blocks: number,
  rng: () => number,
): PlayerId[] {
  const order: PlayerId[] = [];
  for (let block = 0; block < blocks; block += 1) {
    order.push(...shuffle(players, rng));
  }
  return order;
}

/**
 * Index of the next scheduled drawer after `fromIndex` who is still present,
 * or -1 when the rest of the schedule names only departed players.
 */
export function nextPresentDrawerIndex(
  order: readonly PlayerId[],
  fromIndex: number,
  isPresent: (playerId: PlayerId) => boolean,
): number {
  for (let index = fromIndex + 1; index < order.length; index += 1) {
    const candidate = order[index];
    if (candidate !== undefined && isPresent(candidate)) {
      return index;
    }
  }
  return -1;
}

export function normalizeGuess(text: string): string {
  return text.trim().toLocaleLowerCase();
}

export function isCorrectGuess(text: string, word: string): boolean {
  return normalizeGuess(text) === normalizeGuess(word);
}

// -----------------------------------------------------------------------------
//  Assertion function: checks the room invariants after every mutation
// -----------------------------------------------------------------------------
export function assertValidRoom(room: Room): void {
  const fail = (reason: string): never => {
    throw new InvalidRoomStateError(reason, room.id);
  };

  const players = room.players();
  if (players.length > room.settings.maxPlayers) fail("more players than capacity");

  const drawers = players.filter((player) => player.isDrawer);
  if (drawers.length > 1) fail("more than one drawer");

  const owner = room.ownerId;
  if (players.length > 0 && (owner === undefined || !room.hasPlayer(owner)))
    fail("owner is not a member");

  switch (room.status) {
    case "playing": {
      const index = room.currentDrawerIndex;
      const order = room.drawerOrder;
      if (index < 0 || index >= order.length) fail("drawer index out of range");
      const scheduled = order[index];
      if (scheduled === undefined || !room.hasPlayer(scheduled))
        fail("scheduled drawer is not present");
      if (drawers[0]?.id !== scheduled) fail("drawer flag does not match schedule");
      if (!room.hasActiveWord) fail("playing without a word");
      break;
    }
    case "waiting":
    case "ended": {
      if (drawers.length > 0) fail(`drawer flagged while ${room.status}`);
      if (room.hasActiveWord) fail(`word set while ${room.status}`);
      break;
    }
    default:
      fail(`invalid status: ${String(room.status)}`);
  }
}
