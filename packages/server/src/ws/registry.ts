import type { ConnectionRegistry, RegisteredConnection, WsConnection } from "./types.js";

interface RegistryState {
  // Map iteration follows insertion order, which is join order.
  connections: Map<WsConnection, RegisteredConnection>;
  controller: RegisteredConnection | undefined;
  nextSeq: number;
}

function addConnection(state: RegistryState, ws: WsConnection, identity: string): boolean {
  if (state.connections.has(ws)) {
    return state.controller?.connection === ws;
  }

  const entry: RegisteredConnection = { connection: ws, identity, joinSeq: state.nextSeq++ };
  state.connections.set(ws, entry);
  if (!state.controller) {
    state.controller = entry;
    return true;
  }
  return false;
}

function earliestJoined(state: RegistryState): RegisteredConnection | undefined {
  let earliest: RegisteredConnection | undefined;
  for (const entry of state.connections.values()) {
    if (!earliest || entry.joinSeq < earliest.joinSeq) earliest = entry;
  }
  return earliest;
}

function removeConnection(state: RegistryState, ws: WsConnection): RegisteredConnection | undefined {
  if (!state.connections.delete(ws)) return undefined;
  if (state.controller?.connection !== ws) return undefined;

  state.controller = earliestJoined(state);
  return state.controller;
}

export function createConnectionRegistry(): ConnectionRegistry {
  const state: RegistryState = { connections: new Map(), controller: undefined, nextSeq: 0 };

  return {
    add: (ws, identity) => addConnection(state, ws, identity),
    remove: (ws) => removeConnection(state, ws),
    get: (ws) => state.connections.get(ws),
    has: (ws) => state.connections.has(ws),
    isController: (ws) => state.controller?.connection === ws,
    size: () => state.connections.size,
    controllerIdentity: () => state.controller?.identity ?? null,
    getConnections: () => [...state.connections.values()],
  };
}
