export type { SignalColor, SignalStatus } from "./signal.js";
export { SIGNAL_COLORS, INITIAL_SIGNAL_COLOR, isSignalColor } from "./signal.js";

export type {
  WsClientColorChange,
  WsClientMessage,
  WsServerStateUpdate,
  WsServerColorChange,
  WsServerUserUpdate,
  WsServerMessage,
} from "./ws.js";

export { isWsClientMessage } from "./ws.js";
