export { createConnectionRegistry } from "./registry.js";
export { createWsBridge } from "./bridge.js";
export type { WsBridgeDeps, WsBridge } from "./bridge.js";
export { createWsServer, createUpgradeHandler, parseIdentity, decodeFrame } from "./server.js";
export type { WsServerConfig, WsServer, UpgradeHandler } from "./server.js";
export type {
  WsConnection,
  WsConnectionData,
  RegisteredConnection,
  ConnectionRegistry,
} from "./types.js";
