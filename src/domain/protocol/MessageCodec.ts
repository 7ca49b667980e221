import { ProtocolError } from "../errors/ProtocolError.js";
import type { Message, MessageData } from "./messages.js";

const encoder = new TextEncoder();
// Non-fatal decoding substitutes U+FFFD for every invalid sequence.
const decoder = new TextDecoder("utf-8", { fatal: false });

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Serialises a message as UTF-8 JSON. Non-ASCII text is written as literal
 * characters, never as `\u` escapes.
 */
export function encodeMessage(message: Message): Uint8Array {
  return encoder.encode(encodeMessageText(message));
}

export function encodeMessageText(message: Message): string {
  return JSON.stringify({ type: message.type, data: message.data });
}

export function decodeUtf8(frame: Uint8Array): string {
  return decoder.decode(frame);
}

/**
 * Parses one frame. Invalid UTF-8 never throws; anything that is not a
 * `{ type, data }` object raises {@link ProtocolError}.
 */
export function decodeMessage(frame: Uint8Array | string): Message {
  const text = typeof frame === "string" ? frame : decodeUtf8(frame);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(error instanceof Error ? error.message : "invalid JSON");
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError("frame is not an object");
  }

  const { type, data } = parsed;
  if (typeof type !== "string" || type.length === 0) {
    throw new ProtocolError("missing type field");
  }

  if (data === undefined) {
    return { type, data: {} };
  }
  if (!isRecord(data)) {
    throw new ProtocolError("data must be an object");
  }

  return { type, data: data satisfies MessageData };
}
