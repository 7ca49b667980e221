export interface GameConfig {
  readonly minPlayers: number;
  readonly maxPlayers: number;
  /** Rotation blocks per game: how many times every player draws. */
  readonly roundsPerPlayer: number;
  /** Round timer; 0 disables it. */
  readonly roundDurationMs: number;
  /** Pause clients show between rounds; published with the room, never waited on here. */
  readonly restDurationMs: number;
  readonly guessPoints: number;
  readonly drawerBonus: number;
  /** Upper bound for points the drawer may hand out with `give_score`. */
  readonly maxGivenScore: number;
  readonly maxDisplayNameLength: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    minPlayers: overrides.minPlayers ?? 2,
    maxPlayers: overrides.maxPlayers ?? 8,
    roundsPerPlayer: overrides.roundsPerPlayer ?? 3,
    roundDurationMs: overrides.roundDurationMs ?? 60_000,
    restDurationMs: overrides.restDurationMs ?? 10_000,
    guessPoints: overrides.guessPoints ?? 10,
    drawerBonus: overrides.drawerBonus ?? 5,
    maxGivenScore: overrides.maxGivenScore ?? 10,
    maxDisplayNameLength: overrides.maxDisplayNameLength ?? 24,
  };
}

/** Per-room settings the owner may change while the room is waiting. */
export interface RoomSettings {
  maxPlayers: number;
  roundsPerPlayer: number;
  roundDurationMs: number;
  restDurationMs: number;
}

export function roomSettingsFrom(config: GameConfig): RoomSettings {
  return {
    maxPlayers: config.maxPlayers,
    roundsPerPlayer: config.roundsPerPlayer,
    roundDurationMs: config.roundDurationMs,
    restDurationMs: config.restDurationMs,
  };
}
