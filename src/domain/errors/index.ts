export { GameCommandInputError } from "./GameCommandInputError.js";
export { GameRuleError, type GameRuleViolation } from "./GameRuleError.js";
export { NotConnectedError } from "./NotConnectedError.js";
export { ProtocolError } from "./ProtocolError.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
export { InvalidRoomStateError } from "./InvalidRoomStateError.js";
