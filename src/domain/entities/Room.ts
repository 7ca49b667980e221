import { GameRuleError } from "../errors/GameRuleError.js";
import type { RoomSettings } from "../GameConfig.js";
import type { RankingEntry, RoomView } from "../protocol/messages.js";
import type { WordSource } from "../ports/WordSource.js";
import type { Player, PlayerId, RoomId, RoomStatus } from "../typedefs.js";
import {
  buildDrawerOrder,
  isCorrectGuess,
  mulberry32,
  nextPresentDrawerIndex,
} from "./RoomRules.js";
import { projectRoomView, type RoomSnapshot } from "./RoomView.js";

export interface RoomRulesConfig {
  readonly minPlayers: number;
  readonly guessPoints: number;
  readonly drawerBonus: number;
  readonly maxGivenScore: number;
}

export interface RoomOptions {
  readonly settings: RoomSettings;
  readonly rules: RoomRulesConfig;
  readonly words: WordSource;
  /** Seeds the drawer schedule; equal seeds and join orders give equal schedules. */
  readonly seed: number;
}

export interface RoundInfo {
  readonly roundNumber: number;
  readonly totalRounds: number;
  readonly drawerId: PlayerId;
  readonly drawerName: string;
}

export interface FinishedRound {
  readonly roundNumber: number;
  readonly drawerId: PlayerId;
  readonly word: string;
}

export type RoundAdvance =
  | {
      readonly kind: "round";
      readonly round: RoundInfo;
      readonly previous: FinishedRound | undefined;
    }
  | {
      readonly kind: "ended";
      readonly ranking: readonly RankingEntry[];
      readonly previous: FinishedRound | undefined;
    };

export type GuessOutcome =
  | { readonly kind: "correct"; readonly points: number; readonly roundComplete: boolean }
  | { readonly kind: "incorrect" }
  /** The text names the word, but the sender may not score it (drawer or already solved). */
  | { readonly kind: "withheld" };

export interface LeaveOutcome {
  readonly removed: boolean;
  readonly wasDrawer: boolean;
  readonly advance: RoundAdvance | undefined;
}

/**
 * Room state machine. Synchronous and free of I/O: callers serialise access
 * through the registry's per-room lock.
 */
export class Room {
  readonly #players = new Map<PlayerId, Player>();
  readonly #solved = new Set<PlayerId>();
  readonly #rules: RoomRulesConfig;
  readonly #words: WordSource;
  readonly #rng: () => number;
  #settings: RoomSettings;
  #status: RoomStatus = "waiting";
  #drawerOrder: PlayerId[] = [];
  #currentDrawerIndex = -1;
  #currentWord: string | undefined;
  #roundNumber = 0;
  #ownerId: PlayerId | undefined;

  constructor(
    public readonly id: RoomId,
    options: RoomOptions,
  ) {
    this.#settings = { ...options.settings };
    this.#rules = options.rules;
    this.#words = options.words;
    this.#rng = mulberry32(options.seed);
  }

  get status(): RoomStatus {
    return this.#status;
  }

  get roundNumber(): number {
    return this.#roundNumber;
  }

  get currentDrawerIndex(): number {
    return this.#currentDrawerIndex;
  }

  get drawerOrder(): readonly PlayerId[] {
    return [...this.#drawerOrder];
  }

  get ownerId(): PlayerId | undefined {
    return this.#ownerId;
  }

  get settings(): Readonly<RoomSettings> {
    return { ...this.#settings };
  }

  get playerCount(): number {
    return this.#players.size;
  }

  get drawerId(): PlayerId | undefined {
    if (this.#status !== "playing") return undefined;
    return this.#drawerOrder[this.#currentDrawerIndex];
  }

  get totalRounds(): number {
    return this.#status === "waiting"
      ? this.#settings.roundsPerPlayer * this.#players.size
      : this.#drawerOrder.length;
  }

  get hasActiveWord(): boolean {
    return this.#currentWord !== undefined;
  }

  get hasSpareCapacity(): boolean {
    return this.#players.size < this.#settings.maxPlayers;
  }

  hasPlayer(playerId: PlayerId): boolean {
    return this.#players.has(playerId);
  }

  memberIds(): PlayerId[] {
    return [...this.#players.keys()];
  }

  players(): Player[] {
    return [...this.#players.values()].map((player) => ({ ...player }));
  }

  player(playerId: PlayerId): Player | undefined {
    const player = this.#players.get(playerId);
    return player ? { ...player } : undefined;
  }

  join(playerId: PlayerId, displayName: string): Player {
    const existing = this.#players.get(playerId);
    if (existing) return { ...existing };

    if (this.#players.size >= this.#settings.maxPlayers) {
      throw GameRuleError.roomFull(this.id, this.#settings.maxPlayers);
    }
    if (this.#status === "playing") throw GameRuleError.gameInProgress(this.id);
    if (this.#status === "ended") throw GameRuleError.gameOver(this.id);

    const player: Player = {
      id: playerId,
      displayName,
      score: 0,
      isDrawer: false,
      isReady: false,
    };
    this.#players.set(playerId, player);
    this.#ownerId ??= playerId;
    return { ...player };
  }

  leave(playerId: PlayerId): LeaveOutcome {
    const player = this.#players.get(playerId);
    if (!player) return { removed: false, wasDrawer: false, advance: undefined };

    const wasDrawer = this.drawerId === playerId;
    const interrupted = this.#finishedRound();
    this.#players.delete(playerId);
    this.#solved.delete(playerId);

    if (this.#ownerId === playerId) {
      const [nextOwner] = this.#players.keys();
      this.#ownerId = nextOwner;
    }

    if (this.#status !== "playing") {
      return { removed: true, wasDrawer: false, advance: undefined };
    }

    if (this.#players.size < this.#rules.minPlayers) {
      this.#end();
      return {
        removed: true,
        wasDrawer,
        advance: { kind: "ended", ranking: this.ranking(), previous: interrupted },
      };
    }

    if (!wasDrawer) {
      // The departed guesser may have been the last one still guessing.
      const advance = this.#everyGuesserSolved() ? this.advanceOrFinish() : undefined;
      return { removed: true, wasDrawer, advance };
    }

    // The departed drawer's flag left with them; the round restarts from the schedule.
    this.#currentWord = undefined;
    const advance = this.advanceOrFinish();
    return { removed: true, wasDrawer, advance: { ...advance, previous: interrupted } };
  }

  start(requestingPlayerId: PlayerId): RoundAdvance {
    this.#assertOwner(requestingPlayerId);
    if (this.#status !== "waiting") throw GameRuleError.alreadyStarted(this.id);
    if (this.#players.size < this.#rules.minPlayers) {
      throw GameRuleError.notEnoughPlayers(this.#rules.minPlayers, this.#players.size);
    }

    this.#drawerOrder = buildDrawerOrder(
      this.memberIds(),
      this.#settings.roundsPerPlayer,
      this.#rng,
    );
    this.#status = "playing";
    this.#roundNumber = 0;
    this.#currentDrawerIndex = -1;
    for (const player of this.#players.values()) {
      player.score = 0;
      player.isReady = true;
    }

    return this.advanceRound();
  }

  advanceRound(): RoundAdvance {
    if (this.#status === "waiting") throw GameRuleError.notStarted(this.id);
    if (this.#status === "ended") throw GameRuleError.gameOver(this.id);

    const previous = this.#finishedRound();
    const exhausted =
      this.#roundNumber + 1 > this.#drawerOrder.length ||
      this.#currentDrawerIndex + 1 >= this.#drawerOrder.length;
    if (exhausted) {
      this.#end();
      return { kind: "ended", ranking: this.ranking(), previous };
    }

    const nextIndex = nextPresentDrawerIndex(
      this.#drawerOrder,
      this.#currentDrawerIndex,
      (playerId) => this.#players.has(playerId),
    );
    const nextDrawer = this.#players.get(this.#drawerOrder[nextIndex] ?? "");
    if (nextIndex < 0 || !nextDrawer) throw GameRuleError.noPlayersLeft(this.id);

    for (const player of this.#players.values()) player.isDrawer = false;
    nextDrawer.isDrawer = true;
    this.#currentDrawerIndex = nextIndex;
    this.#currentWord = this.#words.nextWord();
    this.#roundNumber += 1;
    this.#solved.clear();

    return {
      kind: "round",
      previous,
      round: {
        roundNumber: this.#roundNumber,
        totalRounds: this.#drawerOrder.length,
        drawerId: nextDrawer.id,
        drawerName: nextDrawer.displayName,
      },
    };
  }

  /** Advances, ending the game when the rest of the schedule names only departed players. */
  advanceOrFinish(): RoundAdvance {
    try {
      return this.advanceRound();
    } catch (error) {
      if (error instanceof GameRuleError && error.code === "NoPlayersLeft") {
        return this.finish();
      }
      throw error;
    }
  }

  finish(): RoundAdvance {
    const previous = this.#finishedRound();
    this.#end();
    return { kind: "ended", ranking: this.ranking(), previous };
  }

  /** Ends the current round early on behalf of the owner or the drawer. */
  endRoundBy(requestingPlayerId: PlayerId): RoundAdvance {
    if (!this.#players.has(requestingPlayerId)) throw GameRuleError.notInRoom(requestingPlayerId);
    if (requestingPlayerId !== this.#ownerId && requestingPlayerId !== this.drawerId) {
      throw GameRuleError.notRoomOwner(requestingPlayerId);
    }
    return this.advanceOrFinish();
  }

  recordGuess(playerId: PlayerId, text: string): GuessOutcome {
    const guesser = this.#players.get(playerId);
    if (!guesser) throw GameRuleError.playerNotFound(playerId);

    const word = this.#currentWord;
    if (this.#status !== "playing" || word === undefined) return { kind: "incorrect" };
    if (!isCorrectGuess(text, word)) return { kind: "incorrect" };

    const drawerId = this.drawerId;
    if (playerId === drawerId || this.#solved.has(playerId)) return { kind: "withheld" };

    this.#solved.add(playerId);
    guesser.score += this.#rules.guessPoints;
    const drawer = drawerId === undefined ? undefined : this.#players.get(drawerId);
    if (drawer) drawer.score += this.#rules.drawerBonus;

    return {
      kind: "correct",
      points: this.#rules.guessPoints,
      roundComplete: this.#everyGuesserSolved(),
    };
  }

  /** The drawer hands extra points to another member; returns the member's new score. */
  giveScore(drawerId: PlayerId, targetId: PlayerId, points: number): number {
    if (!this.#players.has(drawerId)) throw GameRuleError.notInRoom(drawerId);
    if (this.#status !== "playing" || drawerId !== this.drawerId) {
      throw GameRuleError.notDrawer(drawerId);
    }
    const target = this.#players.get(targetId);
    if (!target || targetId === drawerId) throw GameRuleError.playerNotFound(targetId);
    if (!Number.isInteger(points) || points < 1 || points > this.#rules.maxGivenScore) {
      throw GameRuleError.invalidScore(points, this.#rules.maxGivenScore);
    }

    target.score += points;
    return target.score;
  }

  /** The only way the secret word leaves the room. */
  visibleWordFor(playerId: PlayerId): string | undefined {
    if (this.#status !== "playing") return undefined;
    return playerId === this.drawerId ? this.#currentWord : undefined;
  }

  assertCanDraw(playerId: PlayerId): void {
    if (!this.#players.has(playerId)) throw GameRuleError.notInRoom(playerId);
    if (this.#status === "playing" && playerId !== this.drawerId) {
      throw GameRuleError.notDrawer(playerId);
    }
  }

  kick(requestingPlayerId: PlayerId, targetId: PlayerId): LeaveOutcome {
    this.#assertOwner(requestingPlayerId);
    if (targetId === requestingPlayerId || !this.#players.has(targetId)) {
      throw GameRuleError.playerNotFound(targetId);
    }
    return this.leave(targetId);
  }

  configure(requestingPlayerId: PlayerId, patch: Partial<RoomSettings>): RoomSettings {
    this.#assertOwner(requestingPlayerId);
    if (this.#status !== "waiting") throw GameRuleError.alreadyStarted(this.id);

    const { maxPlayers, roundsPerPlayer, roundDurationMs, restDurationMs } = patch;
    if (maxPlayers !== undefined && maxPlayers >= Math.max(this.#players.size, 1)) {
      this.#settings.maxPlayers = maxPlayers;
    }
    if (roundsPerPlayer !== undefined && roundsPerPlayer > 0) {
      this.#settings.roundsPerPlayer = roundsPerPlayer;
    }
    if (roundDurationMs !== undefined && roundDurationMs > 0) {
      this.#settings.roundDurationMs = roundDurationMs;
    }
    if (restDurationMs !== undefined && restDurationMs > 0) {
      this.#settings.restDurationMs = restDurationMs;
    }
    return { ...this.#settings };
  }

  /** Scores descending; ties keep join order. */
  ranking(): RankingEntry[] {
    return [...this.#players.values()]
      .sort((a, b) => b.score - a.score)
      .map((player) => ({
        player_id: player.id,
        name: player.displayName,
        score: player.score,
      }));
  }

  snapshot(): RoomSnapshot {
    return {
      id: this.id,
      ownerId: this.#ownerId,
      status: this.#status,
      players: this.players(),
      roundNumber: this.#roundNumber,
      totalRounds: this.totalRounds,
      drawerId: this.drawerId,
      settings: this.settings,
    };
  }

  viewFor(recipientId: PlayerId): RoomView {
    return projectRoomView(this.snapshot(), this.visibleWordFor(recipientId));
  }

  #assertOwner(playerId: PlayerId): void {
    if (!this.#players.has(playerId)) throw GameRuleError.notInRoom(playerId);
    if (this.#ownerId !== playerId) throw GameRuleError.notRoomOwner(playerId);
  }

  /** True once someone has solved and no present guesser is left to solve. */
  #everyGuesserSolved(): boolean {
    const drawerId = this.drawerId;
    return (
      this.#solved.size > 0 &&
      this.memberIds().every((memberId) => memberId === drawerId || this.#solved.has(memberId))
    );
  }

  #finishedRound(): FinishedRound | undefined {
    const drawerId = this.drawerId;
    const word = this.#currentWord;
    if (this.#status !== "playing" || drawerId === undefined || word === undefined) {
      return undefined;
    }
    return { roundNumber: this.#roundNumber, drawerId, word };
  }

  #end(): void {
    this.#status = "ended";
    this.#currentWord = undefined;
    this.#solved.clear();
    for (const player of this.#players.values()) player.isDrawer = false;
  }
}
