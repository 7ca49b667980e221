/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { RawData, WebSocket } from "ws";

import { decodeMessage, encodeMessage, type Logger, type Message } from "../core.js";

export type CloseReason =
  | "remote"
  | "idle"
  | "protocol"
  | "slow-consumer"
  | "error"
  | "server";

export type SessionEvent =
  | { readonly kind: "message"; readonly message: Message }
  | { readonly kind: "closed"; readonly reason: CloseReason };

export interface SessionOptions {
  /** Frames allowed to wait for the socket before the client counts as stalled. */
  readonly outboundQueueLimit: number;
  /** Consecutive undecodable frames tolerated before the session is closed. */
  readonly maxConsecutiveDecodeFailures: number;
  /** Close after this long without an inbound frame; 0 disables. */
  readonly idleTimeoutMs: number;
  readonly logger?: Logger;
}

const CLOSE_CODES: Record<CloseReason, number> = {
  remote: 1000,
  idle: 1000,
  protocol: 1002,
  "slow-consumer": 1008,
  error: 1011,
  server: 1001,
};

let nextSessionId = 1;

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

/**
 * One live WebSocket connection. Inbound frames are decoded into a queue read
 * with {@link receive}; outbound frames go through a bounded queue written one
 * frame at a time.
 */
export class Session {
  readonly id = `session-${nextSessionId++}`;
  readonly #socket: WebSocket;
  readonly #options: SessionOptions;
  #inbound: SessionEvent[] = [];
  #waiters: Array<(event: SessionEvent) => void> = [];
  #outbound: Uint8Array[] = [];
  #writing = false;
  #decodeFailures = 0;
  #droppedFrames = 0;
  #closeReason: CloseReason | undefined;
  #closeScheduled = false;
  #closeListeners: Array<(reason: CloseReason) => void> = [];
  #idleTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(socket: WebSocket, options: SessionOptions) {
    this.#socket = socket;
    this.#options = options;

    socket.on("message", (data: RawData) => this.#onFrame(data));
    socket.on("close", () => this.close("remote"));
    socket.on("error", (error: Error) => {
      this.#options.logger?.warn?.("WebSocket error", { sessionId: this.id, error });
      this.close("error");
    });

    this.#armIdleTimer();
  }

  get closed(): boolean {
    return this.#closeReason !== undefined;
  }

  get closeReason(): CloseReason | undefined {
    return this.#closeReason;
  }

  /** Frames discarded because they could not be decoded. */
  get droppedFrames(): number {
    return this.#droppedFrames;
  }

  get queuedFrames(): number {
    return this.#outbound.length;
  }

  send(message: Message): boolean {
    return this.sendFrame(encodeMessage(message));
  }

  /**
   * Enqueues an encoded frame. Returns false when the session is closed or its
   * queue is full; a full queue also schedules the session to close.
   */
  sendFrame(frame: Uint8Array): boolean {
    if (this.#closeReason || this.#closeScheduled) return false;

    if (this.#outbound.length >= this.#options.outboundQueueLimit) {
      this.#options.logger?.warn?.("Outbound queue full; closing slow consumer", {
        sessionId: this.id,
        queued: this.#outbound.length,
      });
      this.#closeScheduled = true;
      setImmediate(() => this.close("slow-consumer"));
      return false;
    }

    this.#outbound.push(frame);
    this.#flush();
    return true;
  }

  receive(): Promise<SessionEvent> {
    const queued = this.#inbound.shift();
    if (queued) return Promise.resolve(queued);
    if (this.#closeReason) {
      return Promise.resolve({ kind: "closed", reason: this.#closeReason });
    }
    return new Promise<SessionEvent>((resolve) => {
      this.#waiters.push(resolve);
    });
  }

  /** Runs `listener` once, when the session closes (immediately if it already has). */
  onClose(listener: (reason: CloseReason) => void): void {
    const reason = this.#closeReason;
    if (reason) {
      queueMicrotask(() => listener(reason));
      return;
    }
    this.#closeListeners.push(listener);
  }

  close(reason: CloseReason = "server"): void {
    if (this.#closeReason) return;
    this.#closeReason = reason;
    this.#outbound = [];
    if (this.#idleTimer) clearTimeout(this.#idleTimer);

    try {
      this.#socket.close(CLOSE_CODES[reason], reason);
    } catch (error) {
      this.#options.logger?.debug?.("Socket close failed", { sessionId: this.id, error });
    }

    const waiters = this.#waiters;
    this.#waiters = [];
    for (const resolve of waiters) resolve({ kind: "closed", reason });

    const listeners = this.#closeListeners;
    this.#closeListeners = [];
    for (const listener of listeners) listener(reason);

    this.#options.logger?.info?.("Session closed", { sessionId: this.id, reason });
  }

  #onFrame(data: RawData): void {
    if (this.#closeReason) return;
    this.#armIdleTimer();

    let message: Message;
    try {
      message = decodeMessage(toBytes(data));
    } catch (error) {
      this.#decodeFailures += 1;
      this.#droppedFrames += 1;
      this.#options.logger?.warn?.("Dropped malformed frame", {
        sessionId: this.id,
        consecutive: this.#decodeFailures,
        error,
      });
      if (this.#decodeFailures >= this.#options.maxConsecutiveDecodeFailures) {
        this.close("protocol");
      }
      return;
    }

    this.#decodeFailures = 0;
    const event: SessionEvent = { kind: "message", message };
    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.#inbound.push(event);
    }
  }

  #flush(): void {
    if (this.#writing || this.#closeReason) return;
    const frame = this.#outbound.shift();
    if (!frame) return;

    this.#writing = true;
    try {
      this.#socket.send(frame, { binary: false }, (error?: Error) => {
        this.#writing = false;
        if (error) {
          this.#options.logger?.warn?.("Failed to deliver frame", { sessionId: this.id, error });
          this.close("error");
          return;
        }
        this.#flush();
      });
    } catch (error) {
      this.#writing = false;
      this.#options.logger?.warn?.("Failed to deliver frame", { sessionId: this.id, error });
      this.close("error");
    }
  }

  #armIdleTimer(): void {
    const { idleTimeoutMs } = this.#options;
    if (idleTimeoutMs <= 0) return;
    if (this.#idleTimer) clearTimeout(this.#idleTimer);
    this.#idleTimer = setTimeout(() => this.close("idle"), idleTimeoutMs);
    this.#idleTimer.unref?.();
  }
}
