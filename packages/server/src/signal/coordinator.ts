import type {
  SignalColor,
  WsServerColorChange,
  WsServerStateUpdate,
  WsServerUserUpdate,
} from "@lamplight/shared";

import { INITIAL_SIGNAL_COLOR, isSignalColor } from "@lamplight/shared";

import type { ConnectionRegistry, RegisteredConnection, WsConnection } from "../ws/types.js";
import type { Delivery, DeliveryReport } from "./delivery.js";
import { deliverAll, toEveryone } from "./delivery.js";
import { formatTimestamp } from "./timestamp.js";

export interface SignalCoordinatorDeps {
  registry: ConnectionRegistry;
  now: () => Date;
}

export interface ConnectResult {
  isController: boolean;
  currentColor: SignalColor;
  controllerIdentity: string | null;
}

export type SetColorRejection = "unknown_connection" | "not_controller" | "invalid_color";

export type SetColorResult =
  | { accepted: true; color: SignalColor; report: DeliveryReport }
  | { accepted: false; reason: SetColorRejection };

export interface DisconnectResult {
  removed: boolean;
  promoted: string | null;
  report: DeliveryReport;
}

export interface StatusSnapshot {
  color: SignalColor;
  totalUsers: number;
  controllerIdentity: string | null;
}

export interface SignalCoordinator {
  connect: (ws: WsConnection, identity: string) => ConnectResult;
  disconnect: (ws: WsConnection) => DisconnectResult;
  setColor: (ws: WsConnection, requested: string) => SetColorResult;
  statusSnapshot: () => StatusSnapshot;
}

interface CoordinatorContext {
  deps: SignalCoordinatorDeps;
  color: SignalColor;
}

function buildStateUpdate(ctx: CoordinatorContext, isController: boolean): WsServerStateUpdate {
  return {
    type: "state_update",
    color: ctx.color,
    is_controller: isController,
    controller_id: ctx.deps.registry.controllerIdentity(),
    timestamp: formatTimestamp(ctx.deps.now()),
  };
}

function buildUserUpdate(ctx: CoordinatorContext): WsServerUserUpdate {
  return {
    type: "user_update",
    total_users: ctx.deps.registry.size(),
    controller_id: ctx.deps.registry.controllerIdentity(),
  };
}

function buildColorChange(ctx: CoordinatorContext): WsServerColorChange {
  return { type: "color_change", color: ctx.color, timestamp: formatTimestamp(ctx.deps.now()) };
}

function connect(ctx: CoordinatorContext, ws: WsConnection, identity: string): ConnectResult {
  const { registry } = ctx.deps;
  const isController = registry.add(ws, identity);
  const recipients = registry.getConnections();
  const joiner = registry.get(ws);

  const deliveries: Delivery[] = joiner
    ? [{ recipient: joiner, message: buildStateUpdate(ctx, isController) }]
    : [];
  deliveries.push(...toEveryone(recipients, buildUserUpdate(ctx)));
  deliverAll(deliveries);

  return {
    isController,
    currentColor: ctx.color,
    controllerIdentity: registry.controllerIdentity(),
  };
}

/** Tells every survivor its role after a promotion. */
function roleCorrections(
  ctx: CoordinatorContext,
  recipients: readonly RegisteredConnection[],
  promoted: RegisteredConnection,
): Delivery[] {
  return recipients.map((recipient) => ({
    recipient,
    message: buildStateUpdate(ctx, recipient === promoted),
  }));
}

function disconnect(ctx: CoordinatorContext, ws: WsConnection): DisconnectResult {
  const { registry } = ctx.deps;
  if (!registry.has(ws)) {
    return { removed: false, promoted: null, report: { delivered: 0, failed: [] } };
  }

  const promoted = registry.remove(ws);
  const recipients = registry.getConnections();

  const deliveries: Delivery[] = promoted ? roleCorrections(ctx, recipients, promoted) : [];
  deliveries.push(...toEveryone(recipients, buildUserUpdate(ctx)));

  return {
    removed: true,
    promoted: promoted?.identity ?? null,
    report: deliverAll(deliveries),
  };
}

function setColor(ctx: CoordinatorContext, ws: WsConnection, requested: string): SetColorResult {
  const { registry } = ctx.deps;
  if (!registry.has(ws)) return { accepted: false, reason: "unknown_connection" };
  if (!registry.isController(ws)) return { accepted: false, reason: "not_controller" };
  if (!isSignalColor(requested)) return { accepted: false, reason: "invalid_color" };

  ctx.color = requested;
  const report = deliverAll(toEveryone(registry.getConnections(), buildColorChange(ctx)));
  return { accepted: true, color: requested, report };
}

/**
 * Owns the lamp color and decides who may change it.
 *
 * Every operation runs synchronously to completion: registry changes, the
 * recipient snapshot and the sends all happen before control returns to the
 * event loop, so operations from different sockets never interleave.
 */
export function createSignalCoordinator(deps: SignalCoordinatorDeps): SignalCoordinator {
  const ctx: CoordinatorContext = { deps, color: INITIAL_SIGNAL_COLOR };

  return {
    connect: (ws, identity) => connect(ctx, ws, identity),
    disconnect: (ws) => disconnect(ctx, ws),
    setColor: (ws, requested) => setColor(ctx, ws, requested),
    statusSnapshot: () => ({
      color: ctx.color,
      totalUsers: deps.registry.size(),
      controllerIdentity: deps.registry.controllerIdentity(),
    }),
  };
}
