export class ProtocolError extends Error {
  constructor(public readonly reason: string) {
    super(`Malformed frame: ${reason}`);
    this.name = "ProtocolError";
  }
}
