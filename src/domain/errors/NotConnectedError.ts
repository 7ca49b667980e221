export class NotConnectedError extends Error {
  constructor(public readonly messageType: string) {
    super(`Handshake required before "${messageType}"`);
    this.name = "NotConnectedError";
  }
}
