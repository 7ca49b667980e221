import { vi, type Mock } from "vitest";
import type { WebSocket } from "ws";

import { decodeMessage, type Message } from "../../src/core.js";

type SendCallback = (error?: Error) => void;
type SendFn = (data: unknown, options: unknown, cb?: SendCallback) => void;
type CloseFn = (code?: number, reason?: string) => void;

export interface FakeSocket {
  readonly socket: WebSocket;
  readonly send: Mock<SendFn>;
  readonly close: Mock<CloseFn>;
  emit(event: string, ...args: unknown[]): void;
  /** Frames written so far, decoded. */
  messages(): Message[];
}

/**
 * Minimal stand-in for a `ws` socket. By default every send completes at once;
 * pass `autoFlush: false` to leave sends pending, like a stalled client.
 */
export function createFakeSocket({ autoFlush = true } = {}): FakeSocket {
  const handlers = new Map<string, Array<(...args: unknown[]) => void>>();
  const send = vi.fn<SendFn>((_data, _options, cb) => {
    if (autoFlush) cb?.();
  });
  const close = vi.fn<CloseFn>();
  const socket = {
    readyState: 1,
    send,
    close,
    on: vi.fn((event: string, handler: (...args: unknown[]) => void) => {
      const list = handlers.get(event) ?? [];
      list.push(handler);
      handlers.set(event, list);
    }),
  };

  return {
    socket: socket as unknown as WebSocket,
    send,
    close,
    emit(event: string, ...args: unknown[]): void {
      for (const handler of handlers.get(event) ?? []) {
        handler(...args);
      }
    },
    messages(): Message[] {
      return send.mock.calls.flatMap(([data]) =>
        data instanceof Uint8Array ? [decodeMessage(data)] : [],
      );
    },
  } satisfies FakeSocket;
}

export function frame(type: string, data: Record<string, unknown> = {}): Buffer {
  return Buffer.from(JSON.stringify({ type, data }));
}
