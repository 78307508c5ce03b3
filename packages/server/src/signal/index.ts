export { createSignalCoordinator } from "./coordinator.js";
export type {
  SignalCoordinatorDeps,
  SignalCoordinator,
  ConnectResult,
  DisconnectResult,
  SetColorRejection,
  SetColorResult,
  StatusSnapshot,
} from "./coordinator.js";
export type { DeliveryReport } from "./delivery.js";
