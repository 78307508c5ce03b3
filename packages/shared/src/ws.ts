import type { SignalColor } from "./signal.js";

/**
 * Request to change the lamp. `color` is left as a plain string so that
 * unknown values reach the coordinator, which drops them.
 */
export interface WsClientColorChange {
  type: "color_change";
  color: string;
}

export type WsClientMessage = WsClientColorChange;

export interface WsServerStateUpdate {
  type: "state_update";
  color: SignalColor;
  is_controller: boolean;
  controller_id: string | null;
  timestamp: string;
}

export interface WsServerColorChange {
  type: "color_change";
  color: SignalColor;
  timestamp: string;
}

export interface WsServerUserUpdate {
  type: "user_update";
  total_users: number;
  controller_id: string | null;
}

export type WsServerMessage =
  | WsServerStateUpdate
  | WsServerColorChange
  | WsServerUserUpdate;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isColorChangeMessage(msg: Record<string, unknown>): boolean {
  return msg["type"] === "color_change" && typeof msg["color"] === "string";
}

export function isWsClientMessage(msg: unknown): msg is WsClientMessage {
  if (!isRecord(msg)) return false;
  return isColorChangeMessage(msg);
}
