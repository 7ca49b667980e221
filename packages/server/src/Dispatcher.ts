/* eslint-disable functional/immutable-data */
import { randomUUID } from "node:crypto";
import type { WebSocket } from "ws";

import type { SessionHub } from "./adapters/SessionHub.js";
import {
  ConfigureRoom,
  GameCommandInputError,
  GameRuleError,
  GiveScore,
  JoinRoom,
  KickPlayer,
  LeaveRoom,
  MessageType,
  NextRound,
  NotConnectedError,
  RelayDrawing,
  RoomNotFoundError,
  StartGame,
  SubmitChat,
  createMessage,
  dispatchCommand,
  readChatText,
  readConnect,
  readDrawStroke,
  readGiveScore,
  readJoinRoom,
  readKickTarget,
  readRoomSettings,
} from "./core.js";
import type {
  Command,
  CommandContext,
  GameConfig,
  Logger,
  Message,
  PlayerId,
  RoomId,
  RoomRegistry,
  Scheduler,
  TimePoint,
} from "./core.js";
import { Session, type CloseReason, type SessionOptions } from "./session/Session.js";

type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface DispatcherOptions {
  readonly registry: RoomRegistry;
  readonly hub: SessionHub;
  readonly scheduler: Scheduler;
  readonly config: GameConfig;
  readonly session: Omit<SessionOptions, "logger">;
  readonly logger: Logger;
  readonly dispatch?: DispatchCommand;
  readonly generatePlayerId?: () => PlayerId;
  readonly clock?: () => TimePoint;
}

interface Connection {
  readonly session: Session;
  playerId?: PlayerId;
  displayName?: string;
  roomId?: RoomId;
}

interface Identified extends Connection {
  readonly playerId: PlayerId;
  readonly displayName: string;
}

/**
 * Accepts connections and runs one worker per session. Each worker reads its
 * session's frames in order and turns them into room commands; every failure
 * is answered to the sender and never ends the worker.
 */
export class Dispatcher {
  readonly #connections = new Map<Session, Connection>();
  readonly #players = new Map<PlayerId, Connection>();
  readonly #workers = new Set<Promise<void>>();
  readonly #options: DispatcherOptions;
  readonly #dispatch: DispatchCommand;
  readonly #generatePlayerId: () => PlayerId;
  readonly #clock: () => TimePoint;

  constructor(options: DispatcherOptions) {
    this.#options = options;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#generatePlayerId = options.generatePlayerId ?? randomUUID;
    this.#clock = options.clock ?? Date.now;
  }

  get connectionCount(): number {
    return this.#connections.size;
  }

  accept(socket: WebSocket): Session {
    const { logger } = this.#options;
    const session = new Session(socket, { ...this.#options.session, logger });
    const connection: Connection = { session };
    this.#connections.set(session, connection);

    const worker = this.#run(connection)
      .catch((error: unknown) => {
        logger.error("Connection worker failed", { sessionId: session.id, error });
      })
      .finally(() => {
        this.#workers.delete(worker);
      });
    this.#workers.add(worker);

    logger.info("Connection accepted", { sessionId: session.id });
    return session;
  }

  /** Closes every session and waits for their workers to finish leaving rooms. */
  async shutdown(): Promise<void> {
    for (const session of this.#connections.keys()) session.close("server");
    await Promise.all([...this.#workers]);
  }

  async #run(connection: Connection): Promise<void> {
    const { session } = connection;
    for (;;) {
      const event = await session.receive();
      if (event.kind === "closed") {
        await this.#disconnect(connection, event.reason);
        return;
      }
      await this.handle(connection.session, event.message);
    }
  }

  async handle(session: Session, message: Message): Promise<void> {
    const connection = this.#connections.get(session);
    if (!connection) return;

    try {
      await this.#route(connection, message);
    } catch (error) {
      this.#reportError(connection, message.type, error);
    }
  }

  async #route(connection: Connection, message: Message): Promise<void> {
    if (message.type === MessageType.Connect) {
      this.#handshake(connection, message);
      return;
    }

    const client = this.#identified(connection, message.type);
    const { data } = message;
    const at = this.#clock();

    switch (message.type) {
      case MessageType.JoinRoom: {
        const { roomId } = readJoinRoom(data);
        if (client.roomId !== undefined) {
          if (client.roomId === roomId) {
            this.#options.hub.send(
              client.playerId,
              createMessage(MessageType.RoomJoined, { room_id: roomId }),
            );
            return;
          }
          await this.#leaveCurrentRoom(client, "left");
        }
        client.roomId = await this.#execute(
          new JoinRoom(client.playerId, client.displayName, roomId, at),
        );
        return;
      }

      case MessageType.LeaveRoom: {
        this.#roomOf(client);
        await this.#leaveCurrentRoom(client, "left");
        return;
      }

      case MessageType.ListRooms: {
        const rooms = await this.#options.registry.listRooms();
        this.#options.hub.send(client.playerId, createMessage(MessageType.Rooms, { rooms }));
        return;
      }

      case MessageType.StartGame: {
        await this.#execute(new StartGame(client.playerId, this.#roomOf(client), at));
        return;
      }

      case MessageType.NextRound: {
        await this.#execute(new NextRound(client.playerId, this.#roomOf(client), at));
        return;
      }

      case MessageType.SetGameConfig: {
        const patch = readRoomSettings(data);
        await this.#execute(new ConfigureRoom(client.playerId, this.#roomOf(client), patch, at));
        return;
      }

      case MessageType.KickPlayer: {
        const roomId = this.#roomOf(client);
        const targetId = readKickTarget(data);
        await this.#execute(new KickPlayer(client.playerId, roomId, targetId, at));
        const target = this.#players.get(targetId);
        if (target?.roomId === roomId) target.roomId = undefined;
        return;
      }

      case MessageType.GiveScore: {
        const { targetId, points } = readGiveScore(data);
        await this.#execute(
          new GiveScore(client.playerId, this.#roomOf(client), targetId, points, at),
        );
        return;
      }

      case MessageType.Draw: {
        const stroke = readDrawStroke(data);
        await this.#execute(new RelayDrawing(client.playerId, this.#roomOf(client), stroke, at));
        return;
      }

      case MessageType.Chat:
      case MessageType.Guess: {
        const text = readChatText(data);
        await this.#execute(new SubmitChat(client.playerId, this.#roomOf(client), text, at));
        return;
      }

      default:
        throw GameCommandInputError.because([`Unknown message type: ${message.type}`]);
    }
  }

  #handshake(connection: Connection, message: Message): void {
    const { hub, config, logger } = this.#options;
    const { session } = connection;

    if (connection.playerId !== undefined) {
      session.send(
        createMessage(MessageType.ConnectResponse, {
          success: true,
          player_id: connection.playerId,
          message: "Already connected",
        }),
      );
      return;
    }

    let payload: ReturnType<typeof readConnect>;
    try {
      payload = readConnect(message.data, config.maxDisplayNameLength);
    } catch (error) {
      session.send(
        createMessage(MessageType.ConnectResponse, {
          success: false,
          player_id: "",
          message: error instanceof Error ? error.message : "Invalid handshake",
        }),
      );
      return;
    }

    const playerId = this.#generatePlayerId();
    connection.playerId = playerId;
    connection.displayName = payload.username;
    this.#players.set(playerId, connection);
    hub.attach(playerId, session);

    logger.info("Player connected", {
      sessionId: session.id,
      playerId,
      username: payload.username,
      version: payload.version,
    });

    session.send(
      createMessage(MessageType.ConnectResponse, {
        success: true,
        player_id: playerId,
        message: `Welcome, ${payload.username}`,
      }),
    );
  }

  async #leaveCurrentRoom(client: Identified, reason: "left" | "disconnected"): Promise<void> {
    const roomId = client.roomId;
    if (roomId === undefined) return;
    client.roomId = undefined;
    await this.#execute(new LeaveRoom(client.playerId, roomId, reason, this.#clock()));
  }

  async #disconnect(connection: Connection, reason: CloseReason): Promise<void> {
    const { hub, logger } = this.#options;
    this.#connections.delete(connection.session);

    if (isIdentified(connection)) {
      const client = connection;
      hub.detach(client.playerId, client.session);
      this.#players.delete(client.playerId);
      try {
        await this.#leaveCurrentRoom(client, "disconnected");
      } catch (error) {
        logger.error("Failed to remove disconnected player", {
          playerId: client.playerId,
          error,
        });
      }
    }

    logger.info("Connection closed", {
      sessionId: connection.session.id,
      playerId: connection.playerId,
      reason,
    });
  }

  #execute<TResult>(command: Command<TResult>): Promise<TResult> {
    const { registry, hub, scheduler, config, logger } = this.#options;
    return this.#dispatch(command, { registry, bus: hub, scheduler, config, logger });
  }

  #identified(connection: Connection, type: string): Identified {
    if (!isIdentified(connection)) throw new NotConnectedError(type);
    return connection;
  }

  #roomOf(client: Identified): RoomId {
    if (client.roomId === undefined) throw GameRuleError.notInRoom(client.playerId);
    return client.roomId;
  }

  #reportError(connection: Connection, requestType: string, error: unknown): void {
    const { logger } = this.#options;
    const { code, message } = describeError(error);

    if (code === "InternalError") {
      logger.error("Unhandled error while dispatching", {
        sessionId: connection.session.id,
        type: requestType,
        error,
      });
    } else {
      logger.debug?.("Request rejected", { type: requestType, code, message });
    }

    connection.session.send(
      createMessage(MessageType.Error, { code, message, request: requestType }),
    );
  }
}

function isIdentified(connection: Connection): connection is Identified {
  return connection.playerId !== undefined && connection.displayName !== undefined;
}

export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof GameRuleError) return { code: error.code, message: error.message };
  if (error instanceof NotConnectedError) return { code: "NotConnected", message: error.message };
  if (error instanceof GameCommandInputError) {
    return { code: "InvalidInput", message: error.message };
  }
  if (error instanceof RoomNotFoundError) return { code: "RoomNotFound", message: error.message };
  return { code: "InternalError", message: "Internal server error" };
}
