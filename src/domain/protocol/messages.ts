import type { PlayerId, RoomId, RoomStatus } from "../typedefs.js";

export type MessageData = Readonly<Record<string, unknown>>;

/** One wire message: a type tag plus an object payload. */
export interface Message<TData extends MessageData = MessageData> {
  readonly type: string;
  readonly data: TData;
}

export const MessageType = {
  Connect: "connect",
  ConnectResponse: "connect_response",
  JoinRoom: "join_room",
  RoomJoined: "room_joined",
  LeaveRoom: "leave_room",
  RoomLeft: "room_left",
  ListRooms: "list_rooms",
  Rooms: "rooms",
  StartGame: "start_game",
  NextRound: "next_round",
  SetGameConfig: "set_game_config",
  KickPlayer: "kick_player",
  Kicked: "kicked",
  RoomUpdate: "room_update",
  RoundStart: "round_start",
  RoundEnd: "round_end",
  GameResult: "game_result",
  Draw: "draw",
  Chat: "chat",
  Guess: "guess",
  GuessCorrect: "guess_correct",
  GiveScore: "give_score",
  ScoreGiven: "score_given",
  Error: "error",
} as const;

export function createMessage<TData extends MessageData>(
  type: string,
  data: TData,
): Message<TData> {
  return Object.freeze({ type, data: Object.freeze({ ...data }) });
}

export interface PlayerView {
  readonly id: PlayerId;
  readonly name: string;
  readonly score: number;
  readonly is_drawer: boolean;
  readonly is_ready: boolean;
}

/** Payload of `room_update`, tailored to one recipient. */
export interface RoomView extends MessageData {
  readonly room_id: RoomId;
  readonly owner_id: PlayerId | null;
  readonly status: RoomStatus;
  readonly players: readonly PlayerView[];
  readonly round_number: number;
  readonly total_rounds: number;
  readonly drawer_id: PlayerId | null;
  readonly max_players: number;
  readonly round_time: number;
  readonly rest_time: number;
  readonly current_word?: string;
}

export interface RoomSummary extends MessageData {
  readonly room_id: RoomId;
  readonly player_count: number;
  readonly max_players: number;
  readonly status: RoomStatus;
}

export interface RankingEntry {
  readonly player_id: PlayerId;
  readonly name: string;
  readonly score: number;
}

export type DrawAction = "draw" | "erase" | "clear";

export interface DrawStroke {
  readonly action: DrawAction;
  readonly x?: number;
  readonly y?: number;
  readonly color?: string | readonly number[];
  readonly size?: number;
}
