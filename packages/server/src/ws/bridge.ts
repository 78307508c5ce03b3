import { isWsClientMessage } from "@lamplight/shared";

import type { ConnectResult, DisconnectResult, SetColorResult, SignalCoordinator } from "../signal/index.js";
import type { WsConnection } from "./types.js";

export interface WsBridgeDeps {
  coordinator: SignalCoordinator;
}

export interface WsBridge {
  handleOpen: (ws: WsConnection, identity: string) => ConnectResult;
  handleMessage: (ws: WsConnection, raw: string) => SetColorResult | undefined;
  handleClose: (ws: WsConnection) => DisconnectResult;
}

function handleOpen(deps: WsBridgeDeps, ws: WsConnection, identity: string): ConnectResult {
  const result = deps.coordinator.connect(ws, identity);
  const role = result.isController ? "controller" : "observer";
  console.log(`${identity} joined as ${role}`);
  return result;
}

function handleMessage(deps: WsBridgeDeps, ws: WsConnection, raw: string): SetColorResult | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }

  if (!isWsClientMessage(parsed)) return undefined;

  return deps.coordinator.setColor(ws, parsed.color);
}

function handleClose(deps: WsBridgeDeps, ws: WsConnection): DisconnectResult {
  const result = deps.coordinator.disconnect(ws);
  if (result.promoted !== null) {
    console.log(`${result.promoted} is now the controller`);
  }
  return result;
}

export function createWsBridge(deps: WsBridgeDeps): WsBridge {
  return {
    handleOpen: (ws, identity) => handleOpen(deps, ws, identity),
    handleMessage: (ws, raw) => handleMessage(deps, ws, raw),
    handleClose: (ws) => handleClose(deps, ws),
  };
}
