import { createServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Duplex } from "node:stream";

import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";

import type { SignalCoordinator } from "../signal/index.js";
import type { StatusRouteDeps } from "../status/index.js";
import { handleStatusRequest } from "../status/index.js";
import { createWsBridge } from "./bridge.js";
import type { WsBridge } from "./bridge.js";
import type { WsConnection, WsConnectionData } from "./types.js";

export interface WsServerConfig {
  port: number;
  host: string;
  coordinator: SignalCoordinator;
}

export interface WsServer {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** The bound port once started, so `port: 0` can pick a free one. */
  port: () => number;
}

export type UpgradeHandler = (req: IncomingMessage, socket: Duplex, head: Buffer) => void;

export function parseIdentity(url: string): string | undefined {
  const { pathname } = new URL(url, "http://localhost");
  const segment = /^\/ws\/([^/]+)$/.exec(pathname)?.[1];
  if (!segment) return undefined;
  try {
    const identity = decodeURIComponent(segment);
    return identity.trim() === "" ? undefined : identity;
  } catch {
    return undefined;
  }
}

export function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

function createWsWrapper(ws: WebSocket, data: WsConnectionData): WsConnection {
  return {
    send: (payload) => {
      if (ws.readyState !== WebSocket.OPEN) {
        throw new Error("WebSocket is not open");
      }
      ws.send(payload, (err) => {
        if (err) console.warn(`Failed to send to ${data.identity}: ${err.message}`);
      });
    },
  };
}

function toFetchRequest(req: IncomingMessage): Request {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  return new Request(url, { method: req.method ?? "GET" });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.end(await response.text());
}

async function routeRequest(req: Request, statusRouteDeps: StatusRouteDeps): Promise<Response> {
  const statusResponse = await handleStatusRequest(req, statusRouteDeps);
  if (statusResponse) return statusResponse;

  return new Response("Not Found", { status: 404 });
}

function acceptConnection(bridge: WsBridge, ws: WebSocket, data: WsConnectionData): void {
  const connection = createWsWrapper(ws, data);

  ws.on("message", (message) => {
    bridge.handleMessage(connection, decodeFrame(message));
  });
  ws.on("error", (err) => {
    console.warn(`WebSocket error for ${data.identity}: ${err.message}`);
  });
  // ws emits "close" once per socket, including after an error.
  ws.once("close", () => {
    bridge.handleClose(connection);
    console.log(`${data.identity} left`);
  });

  bridge.handleOpen(connection, data.identity);
}

function onSocketError(err: Error): void {
  console.warn(`Upgrade socket error: ${err.message}`);
}

function rejectUpgrade(socket: Duplex): void {
  socket.once("finish", () => socket.destroy());
  socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
}

/**
 * The HTTP server drops its own socket error handler before emitting
 * "upgrade", so the socket carries ours until ws takes it over.
 */
export function createUpgradeHandler(wss: WebSocketServer, bridge: WsBridge): UpgradeHandler {
  return (req, socket, head) => {
    socket.on("error", onSocketError);

    const identity = parseIdentity(req.url ?? "");
    if (!identity) {
      rejectUpgrade(socket);
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      socket.off("error", onSocketError);
      acceptConnection(bridge, ws, { identity });
    });
  };
}

export function createWsServer(config: WsServerConfig): WsServer {
  const bridge = createWsBridge({ coordinator: config.coordinator });
  const statusRouteDeps: StatusRouteDeps = { coordinator: config.coordinator };
  const wss = new WebSocketServer({ noServer: true });

  const server = createServer((req, res) => {
    routeRequest(toFetchRequest(req), statusRouteDeps)
      .then((response) => writeResponse(res, response))
      .catch((err: unknown) => {
        console.error("Failed to handle request:", err);
        if (!res.headersSent) res.statusCode = 500;
        res.end();
      });
  });

  server.on("upgrade", createUpgradeHandler(wss, bridge));

  return {
    start() {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
    },
    stop() {
      // terminate() still emits "close", so every client is disconnected from the coordinator.
      wss.clients.forEach((client) => client.terminate());
      wss.close();
      return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    },
    port() {
      const address = server.address();
      return address !== null && typeof address === "object" ? address.port : config.port;
    },
  };
}
