import { describe, expect, it } from "vitest";

import { Room, type RoomOptions } from "../src/domain/entities/Room.js";
import { assertValidRoom } from "../src/domain/entities/RoomRules.js";
import { GameRuleError, type GameRuleViolation } from "../src/domain/errors/GameRuleError.js";
import { FixedWordSource, TEST_WORDS } from "./support/mocks.js";

function createRoom(overrides: Partial<RoomOptions["settings"]> = {}): Room {
  return new Room("room-1", {
    settings: {
      maxPlayers: 4,
      roundsPerPlayer: 1,
      roundDurationMs: 60_000,
      restDurationMs: 10_000,
      ...overrides,
    },
    rules: { minPlayers: 2, guessPoints: 10, drawerBonus: 5, maxGivenScore: 10 },
    words: new FixedWordSource(TEST_WORDS),
    seed: 42,
  });
}

function withPlayers(count: number, overrides: Partial<RoomOptions["settings"]> = {}): Room {
  const room = createRoom(overrides);
  for (let index = 1; index <= count; index += 1) {
    room.join(`p${index}`, `Player ${index}`);
  }
  return room;
}

function expectRuleError(fn: () => unknown, code: GameRuleViolation): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(GameRuleError);
    expect(error instanceof GameRuleError ? error.code : undefined).toBe(code);
    return;
  }
  throw new Error(`Expected ${code}`);
}

describe("Room membership", () => {
  it("makes the first joiner the owner", () => {
    const room = withPlayers(2);

    expect(room.ownerId).toBe("p1");
    expect(room.memberIds()).toEqual(["p1", "p2"]);
    expect(room.status).toBe("waiting");
  });

  it("treats a repeated join as a no-op", () => {
    const room = withPlayers(1);
    room.join("p1", "Renamed");

    expect(room.playerCount).toBe(1);
    expect(room.player("p1")?.displayName).toBe("Player 1");
  });

  it("rejects joins beyond capacity", () => {
    const room = withPlayers(4);

    expectRuleError(() => room.join("p5", "Player 5"), "RoomFull");
    expect(room.playerCount).toBe(4);
  });

  it("passes ownership to the next player when the owner leaves", () => {
    const room = withPlayers(3);

    expect(room.leave("p1")).toEqual({ removed: true, wasDrawer: false, advance: undefined });
    expect(room.ownerId).toBe("p2");
  });

  it("ignores a leave from a non-member", () => {
    const room = withPlayers(2);

    expect(room.leave("stranger")).toEqual({
      removed: false,
      wasDrawer: false,
      advance: undefined,
    });
  });

  it("clears the owner once the last player leaves", () => {
    const room = withPlayers(1);
    room.leave("p1");

    expect(room.ownerId).toBeUndefined();
    expect(room.playerCount).toBe(0);
  });
});

describe("Room game flow", () => {
  it("only lets the owner start", () => {
    const room = withPlayers(2);

    expectRuleError(() => room.start("p2"), "NotRoomOwner");
    expectRuleError(() => room.start("stranger"), "NotInRoom");
    expect(room.status).toBe("waiting");
  });

  it("needs the minimum number of players", () => {
    const room = withPlayers(1);

    expectRuleError(() => room.start("p1"), "NotEnoughPlayers");
    expect(room.status).toBe("waiting");
  });

  it("starts the first round with the first scheduled drawer", () => {
    const room = withPlayers(3, { roundsPerPlayer: 2 });
    const advance = room.start("p1");
    const [firstDrawer] = room.drawerOrder;

    expect(room.status).toBe("playing");
    expect(room.drawerOrder).toHaveLength(6);
    expect(room.totalRounds).toBe(6);
    expect(room.roundNumber).toBe(1);
    expect(room.drawerId).toBe(firstDrawer);
    expect(advance).toEqual({
      kind: "round",
      previous: undefined,
      round: {
        roundNumber: 1,
        totalRounds: 6,
        drawerId: firstDrawer,
        drawerName: room.player(firstDrawer ?? "")?.displayName,
      },
    });
    expect(room.players().every((player) => player.isReady)).toBe(true);
    expect(room.players().filter((player) => player.isDrawer)).toHaveLength(1);
    expect(() => assertValidRoom(room)).not.toThrow();
  });

  it("lets every player draw once per block", () => {
    const room = withPlayers(3, { roundsPerPlayer: 2 });
    const turns = new Map<string, number>();
    const count = () => {
      const drawer = room.drawerId ?? "";
      turns.set(drawer, (turns.get(drawer) ?? 0) + 1);
    };

    room.start("p1");
    count();
    for (let round = 2; round <= 6; round += 1) {
      room.advanceRound();
      count();
      expect(() => assertValidRoom(room)).not.toThrow();
    }

    expect(Object.fromEntries(turns)).toEqual({ p1: 2, p2: 2, p3: 2 });
    expect(room.advanceRound().kind).toBe("ended");
  });

  it("rejects a second start and joins while playing", () => {
    const room = withPlayers(2);
    room.start("p1");

    expectRuleError(() => room.start("p1"), "AlreadyStarted");
    expectRuleError(() => room.join("p3", "Player 3"), "GameInProgress");
  });

  it("rejects advancing a room that has not started", () => {
    const room = withPlayers(2);

    expectRuleError(() => room.advanceRound(), "NotStarted");
  });

  it("walks the schedule and ends with a ranking", () => {
    const room = withPlayers(2);
    room.start("p1");
    const [first, second] = room.drawerOrder;

    const next = room.advanceRound();
    expect(next).toMatchObject({
      kind: "round",
      previous: { roundNumber: 1, drawerId: first, word: "apple" },
      round: { roundNumber: 2, drawerId: second },
    });
    expect(room.visibleWordFor(second ?? "")).toBe("banana");

    const last = room.advanceRound();
    expect(last).toEqual({
      kind: "ended",
      previous: { roundNumber: 2, drawerId: second, word: "banana" },
      ranking: [
        { player_id: "p1", name: "Player 1", score: 0 },
        { player_id: "p2", name: "Player 2", score: 0 },
      ],
    });
    expect(room.status).toBe("ended");
    expect(room.drawerId).toBeUndefined();
    expect(room.hasActiveWord).toBe(false);
    expect(() => assertValidRoom(room)).not.toThrow();

    expectRuleError(() => room.advanceRound(), "GameOver");
    expectRuleError(() => room.join("p3", "Player 3"), "GameOver");
  });

  it("ends the game when too few players remain", () => {
    const room = withPlayers(2);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const guesser = drawer === "p1" ? "p2" : "p1";

    const outcome = room.leave(guesser);

    expect(outcome.removed).toBe(true);
    expect(outcome.wasDrawer).toBe(false);
    expect(outcome.advance).toMatchObject({
      kind: "ended",
      previous: { roundNumber: 1, drawerId: drawer, word: "apple" },
    });
    expect(room.status).toBe("ended");
  });

  it("moves to the next present drawer when the drawer leaves", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer, next] = room.drawerOrder;

    const outcome = room.leave(drawer ?? "");

    expect(outcome).toMatchObject({
      removed: true,
      wasDrawer: true,
      advance: {
        kind: "round",
        previous: { roundNumber: 1, drawerId: drawer, word: "apple" },
        round: { roundNumber: 2, drawerId: next },
      },
    });
    expect(room.drawerId).toBe(next);
    expect(room.visibleWordFor(next ?? "")).toBe("banana");
    expect(() => assertValidRoom(room)).not.toThrow();
  });

  it("ends the round when the last guesser still guessing leaves", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const [solver, leaver] = room.memberIds().filter((id) => id !== drawer);
    expect(room.recordGuess(solver ?? "", "apple")).toMatchObject({ roundComplete: false });

    const outcome = room.leave(leaver ?? "");

    expect(outcome).toMatchObject({
      removed: true,
      wasDrawer: false,
      advance: {
        kind: "round",
        previous: { roundNumber: 1, drawerId: drawer, word: "apple" },
        round: { roundNumber: 2, drawerId: solver },
      },
    });
    expect(room.visibleWordFor(solver ?? "")).toBe("banana");
    expect(() => assertValidRoom(room)).not.toThrow();
  });

  it("keeps the round going when a guesser leaves before anyone solved it", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const [, leaver] = room.memberIds().filter((id) => id !== drawer);

    expect(room.leave(leaver ?? "").advance).toBeUndefined();
    expect(room.roundNumber).toBe(1);
    expect(room.drawerId).toBe(drawer);
  });

  it("reports NoPlayersLeft without changing the room, then finishes", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [, second, third] = room.drawerOrder;
    room.leave(third ?? "");
    room.advanceRound();

    expect(room.drawerId).toBe(second);
    expectRuleError(() => room.advanceRound(), "NoPlayersLeft");
    expect(room.status).toBe("playing");
    expect(room.roundNumber).toBe(2);
    expect(room.drawerId).toBe(second);

    expect(room.advanceOrFinish()).toMatchObject({
      kind: "ended",
      previous: { roundNumber: 2, drawerId: second, word: "banana" },
    });
    expect(room.status).toBe("ended");
  });

  it("lets the owner or the drawer end a round early", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const bystander = room.memberIds().find((id) => id !== drawer && id !== "p1") ?? "";

    expectRuleError(() => room.endRoundBy(bystander), "NotRoomOwner");
    expect(room.endRoundBy(drawer ?? "")).toMatchObject({ kind: "round" });
    expect(room.roundNumber).toBe(2);
    expect(room.endRoundBy("p1")).toMatchObject({ kind: "round" });
    expect(room.roundNumber).toBe(3);
  });
});

describe("Room word secrecy", () => {
  it("shows the word to the drawer only", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;

    for (const memberId of room.memberIds()) {
      const view = room.viewFor(memberId);
      if (memberId === drawer) {
        expect(view.current_word).toBe("apple");
      } else {
        expect(view).not.toHaveProperty("current_word");
      }
      expect(view.drawer_id).toBe(drawer);
    }
  });

  it("shows no word before the game starts", () => {
    const room = withPlayers(2);

    expect(room.visibleWordFor("p1")).toBeUndefined();
    expect(room.viewFor("p1")).toEqual({
      room_id: "room-1",
      owner_id: "p1",
      status: "waiting",
      players: [
        { id: "p1", name: "Player 1", score: 0, is_drawer: false, is_ready: false },
        { id: "p2", name: "Player 2", score: 0, is_drawer: false, is_ready: false },
      ],
      round_number: 0,
      total_rounds: 2,
      drawer_id: null,
      max_players: 4,
      round_time: 60,
      rest_time: 10,
    });
  });
});

describe("Room guesses", () => {
  it("scores a correct guess for the guesser and the drawer", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const [first, second] = room.memberIds().filter((id) => id !== drawer);

    expect(room.recordGuess(first ?? "", "  APPLE ")).toEqual({
      kind: "correct",
      points: 10,
      roundComplete: false,
    });
    expect(room.player(first ?? "")?.score).toBe(10);
    expect(room.player(drawer ?? "")?.score).toBe(5);

    expect(room.recordGuess(first ?? "", "apple")).toEqual({ kind: "withheld" });
    expect(room.recordGuess(drawer ?? "", "apple")).toEqual({ kind: "withheld" });
    expect(room.recordGuess(second ?? "", "pear")).toEqual({ kind: "incorrect" });

    expect(room.recordGuess(second ?? "", "Apple")).toEqual({
      kind: "correct",
      points: 10,
      roundComplete: true,
    });
    expect(room.player(drawer ?? "")?.score).toBe(10);
  });

  it("treats everything as chat while waiting", () => {
    const room = withPlayers(2);

    expect(room.recordGuess("p2", "apple")).toEqual({ kind: "incorrect" });
  });

  it("rejects guesses from non-members", () => {
    const room = withPlayers(2);
    room.start("p1");

    expectRuleError(() => room.recordGuess("stranger", "apple"), "PlayerNotFound");
  });

  it("ranks by score, keeping join order for ties", () => {
    const room = withPlayers(3);
    room.start("p1");
    const [drawer] = room.drawerOrder;
    const [first] = room.memberIds().filter((id) => id !== drawer);
    room.recordGuess(first ?? "", "apple");

    const ranking = room.ranking().map((entry) => [entry.player_id, entry.score]);
    const rest = room.memberIds().filter((id) => id !== drawer && id !== first);

    expect(ranking).toEqual([
      [first, 10],
      [drawer, 5],
      [rest[0], 0],
    ]);
  });
});

describe("Room drawing and administration", () => {
  it("lets any member draw while waiting but only the drawer while playing", () => {
    const room = withPlayers(2);
    expect(() => room.assertCanDraw("p2")).not.toThrow();
    expectRuleError(() => room.assertCanDraw("stranger"), "NotInRoom");

    room.start("p1");
    const [drawer] = room.drawerOrder;
    const guesser = drawer === "p1" ? "p2" : "p1";

    expect(() => room.assertCanDraw(drawer ?? "")).not.toThrow();
    expectRuleError(() => room.assertCanDraw(guesser), "NotDrawer");
  });

  it("lets the owner kick other members", () => {
    const room = withPlayers(3);

    expectRuleError(() => room.kick("p2", "p3"), "NotRoomOwner");
    expectRuleError(() => room.kick("p1", "p1"), "PlayerNotFound");
    expectRuleError(() => room.kick("p1", "stranger"), "PlayerNotFound");

    expect(room.kick("p1", "p3").removed).toBe(true);
    expect(room.memberIds()).toEqual(["p1", "p2"]);
  });

  it("lets the drawer give points to another member", () => {
    const room = withPlayers(3);
    expectRuleError(() => room.giveScore("p1", "p2", 3), "NotDrawer");

    room.start("p1");
    const [drawer] = room.drawerOrder;
    const [target, other] = room.memberIds().filter((id) => id !== drawer);

    expect(room.giveScore(drawer ?? "", target ?? "", 3)).toBe(3);
    expect(room.giveScore(drawer ?? "", target ?? "", 2)).toBe(5);
    expect(room.player(drawer ?? "")?.score).toBe(0);

    expectRuleError(() => room.giveScore("stranger", target ?? "", 1), "NotInRoom");
    expectRuleError(() => room.giveScore(other ?? "", target ?? "", 1), "NotDrawer");
    expectRuleError(() => room.giveScore(drawer ?? "", drawer ?? "", 1), "PlayerNotFound");
    expectRuleError(() => room.giveScore(drawer ?? "", "stranger", 1), "PlayerNotFound");
    expectRuleError(() => room.giveScore(drawer ?? "", target ?? "", 0), "InvalidScore");
    expectRuleError(() => room.giveScore(drawer ?? "", target ?? "", 11), "InvalidScore");
    expect(room.player(target ?? "")?.score).toBe(5);
  });

  it("applies settings from the owner while waiting", () => {
    const room = withPlayers(3);

    expect(
      room.configure("p1", {
        maxPlayers: 2,
        roundsPerPlayer: 2,
        roundDurationMs: 30_000,
        restDurationMs: 5_000,
      }),
    ).toEqual({
      maxPlayers: 4,
      roundsPerPlayer: 2,
      roundDurationMs: 30_000,
      restDurationMs: 5_000,
    });
    expect(room.viewFor("p1").rest_time).toBe(5);
    expect(room.configure("p1", { maxPlayers: 6 }).maxPlayers).toBe(6);
    expect(room.totalRounds).toBe(6);

    expectRuleError(() => room.configure("p2", { maxPlayers: 5 }), "NotRoomOwner");
    room.start("p1");
    expectRuleError(() => room.configure("p1", { maxPlayers: 5 }), "AlreadyStarted");
  });
});
