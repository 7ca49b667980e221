/**
 * Core domain typedefs used throughout the game.
 * These are simple aliases for now; you can later evolve them into
 * branded types for stronger compile-time safety.
 */

/** Opaque identifier of a connected player, issued at handshake */
export type PlayerId = string;

/** Identifier of a room */
export type RoomId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Room lifecycle: waiting → playing → ended (terminal) */
export type RoomStatus = "waiting" | "playing" | "ended";

export interface Player {
  readonly id: PlayerId;
  readonly displayName: string;
  score: number;
  isDrawer: boolean;
  isReady: boolean;
}
