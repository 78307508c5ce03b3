export {
  createConnectionRegistry,
  createWsBridge,
  createWsServer,
} from "./ws/index.js";

export type {
  WsBridgeDeps,
  WsBridge,
  WsServerConfig,
  WsServer,
  WsConnection,
  WsConnectionData,
  RegisteredConnection,
  ConnectionRegistry,
} from "./ws/index.js";

export { createSignalCoordinator } from "./signal/index.js";
export type {
  SignalCoordinatorDeps,
  SignalCoordinator,
  ConnectResult,
  DisconnectResult,
  SetColorRejection,
  SetColorResult,
  StatusSnapshot,
  DeliveryReport,
} from "./signal/index.js";

export { handleStatusRequest } from "./status/index.js";
export type { StatusRouteDeps } from "./status/index.js";

export { loadServerConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
