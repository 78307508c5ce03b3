export interface WsConnection {
  /** Throws when the underlying transport is no longer open. */
  send: (data: string) => void;
}

export interface WsConnectionData {
  identity: string;
}

export interface RegisteredConnection {
  readonly connection: WsConnection;
  readonly identity: string;
  readonly joinSeq: number;
}

export interface ConnectionRegistry {
  add: (ws: WsConnection, identity: string) => boolean;
  remove: (ws: WsConnection) => RegisteredConnection | undefined;
  get: (ws: WsConnection) => RegisteredConnection | undefined;
  has: (ws: WsConnection) => boolean;
  isController: (ws: WsConnection) => boolean;
  size: () => number;
  controllerIdentity: () => string | null;
  getConnections: () => readonly RegisteredConnection[];
}
