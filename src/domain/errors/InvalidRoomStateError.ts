import type { RoomId } from "../typedefs.js";

export class InvalidRoomStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly roomId: RoomId,
  ) {
    super(`Invalid room state: ${reason}`);
    this.name = "InvalidRoomStateError";
  }
}
