import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { Duplex } from "node:stream";

import { test as base, expect, vi } from "vitest";
import { WebSocket, WebSocketServer } from "ws";

import type { WsServerMessage } from "@lamplight/shared";

import { createSignalCoordinator } from "../signal/index.js";
import type { SignalCoordinator } from "../signal/index.js";
import { createWsBridge } from "./bridge.js";
import { createConnectionRegistry } from "./registry.js";
import { createUpgradeHandler, createWsServer, decodeFrame, parseIdentity } from "./server.js";
import type { WsServer } from "./server.js";

interface TestClient {
  ws: WebSocket;
  messages: WsServerMessage[];
}

function openClient(port: number, name: string): Promise<TestClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}/ws/${encodeURIComponent(name)}`);
  const messages: WsServerMessage[] = [];
  ws.on("message", (data) => messages.push(JSON.parse(decodeFrame(data)) as WsServerMessage));
  return new Promise((resolve, reject) => {
    ws.once("open", () => resolve({ ws, messages }));
    ws.once("error", reject);
  });
}

async function startServer(coordinator: SignalCoordinator): Promise<WsServer> {
  const server = createWsServer({ port: 0, host: "127.0.0.1", coordinator });
  await server.start();
  return server;
}

interface ServerFixtures {
  quiet: void;
  coordinator: SignalCoordinator;
  server: WsServer;
}

const test = base.extend<ServerFixtures>({
  quiet: [
    async ({}, use) => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      await use();
      log.mockRestore();
      warn.mockRestore();
    },
    { auto: true },
  ],
  coordinator: async ({}, use) => {
    await use(createSignalCoordinator({ registry: createConnectionRegistry(), now: () => new Date() }));
  },
  server: async ({ coordinator }, use) => {
    const server = await startServer(coordinator);
    await use(server);
    await server.stop();
  },
});

test("parseIdentity reads the name after /ws/", () => {
  expect(parseIdentity("/ws/alice")).toBe("alice");
});

test("parseIdentity decodes percent-encoded names", () => {
  expect(parseIdentity("/ws/Ana%20Mar%C3%ADa")).toBe("Ana María");
});

test("parseIdentity ignores the query string", () => {
  expect(parseIdentity("/ws/bob?reconnect=1")).toBe("bob");
});

test("parseIdentity rejects other paths", () => {
  expect(parseIdentity("/status")).toBeUndefined();
  expect(parseIdentity("/ws/")).toBeUndefined();
  expect(parseIdentity("/ws/a/b")).toBeUndefined();
});

test("parseIdentity rejects blank names", () => {
  expect(parseIdentity("/ws/%20%20")).toBeUndefined();
});

test("parseIdentity rejects malformed escapes", () => {
  expect(parseIdentity("/ws/%E0%A4%A")).toBeUndefined();
});

test("decodeFrame decodes buffers as UTF-8", () => {
  expect(decodeFrame(Buffer.from('{"type":"color_change"}'))).toBe('{"type":"color_change"}');
});

test("decodeFrame joins fragmented frames", () => {
  expect(decodeFrame([Buffer.from('{"color":'), Buffer.from('"red"}')])).toBe('{"color":"red"}');
});

test("decodeFrame decodes array buffers", () => {
  const bytes = new TextEncoder().encode("green");
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);

  expect(decodeFrame(copy)).toBe("green");
});

test("rejected upgrade answers 404 and survives a socket error", async ({ coordinator }) => {
  const handleUpgrade = createUpgradeHandler(
    new WebSocketServer({ noServer: true }),
    createWsBridge({ coordinator }),
  );
  const req = new IncomingMessage(new Socket());
  req.url = "/ws/";
  const chunks: Buffer[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });

  handleUpgrade(req, socket, Buffer.alloc(0));

  expect(socket.listenerCount("error")).toBe(1);
  expect(() => socket.emit("error", new Error("read ECONNRESET"))).not.toThrow();
  expect(console.warn).toHaveBeenCalledWith("Upgrade socket error: read ECONNRESET");
  await vi.waitFor(() => expect(socket.destroyed).toBe(true));
  expect(Buffer.concat(chunks).toString()).toBe("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
});

test("client without a name is refused with 404", async ({ server }) => {
  const ws = new WebSocket(`ws://127.0.0.1:${server.port()}/ws/`);

  const err = await new Promise<Error>((resolve) => ws.once("error", resolve));

  expect(err.message).toBe("Unexpected server response: 404");
});

test("GET /status reports the lamp over HTTP", async ({ server }) => {
  const res = await fetch(`http://127.0.0.1:${server.port()}/status`);

  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({ current_color: "none", total_users: 0, controller_id: null });
});

test("unrouted paths return 404", async ({ server }) => {
  const res = await fetch(`http://127.0.0.1:${server.port()}/`);

  expect(res.status).toBe(404);
  expect(await res.text()).toBe("Not Found");
});

test("clients share the lamp and control passes on when the controller leaves", async ({ server, coordinator }) => {
  const disconnect = vi.spyOn(coordinator, "disconnect");
  const alice = await openClient(server.port(), "alice");
  await vi.waitFor(() => expect(alice.messages).toHaveLength(2));
  const bob = await openClient(server.port(), "bob");
  await vi.waitFor(() => expect(bob.messages).toHaveLength(2));

  expect(alice.messages[0]).toMatchObject({ type: "state_update", color: "none", is_controller: true });
  expect(bob.messages[0]).toMatchObject({ type: "state_update", is_controller: false, controller_id: "alice" });

  alice.ws.send(JSON.stringify({ type: "color_change", color: "red" }));
  await vi.waitFor(() => {
    expect(alice.messages.at(-1)).toMatchObject({ type: "color_change", color: "red" });
    expect(bob.messages.at(-1)).toMatchObject({ type: "color_change", color: "red" });
  });

  alice.ws.close();
  await vi.waitFor(() =>
    expect(bob.messages).toContainEqual(
      expect.objectContaining({ type: "state_update", color: "red", is_controller: true, controller_id: "bob" }),
    ),
  );
  expect(disconnect).toHaveBeenCalledTimes(1);

  bob.ws.send(JSON.stringify({ type: "color_change", color: "green" }));
  await vi.waitFor(() => expect(bob.messages.at(-1)).toMatchObject({ type: "color_change", color: "green" }));

  bob.ws.terminate();
  await vi.waitFor(() => expect(coordinator.statusSnapshot().totalUsers).toBe(0));
  expect(disconnect).toHaveBeenCalledTimes(2);
  expect(new Set(disconnect.mock.calls.map(([ws]) => ws)).size).toBe(2);
  expect(coordinator.statusSnapshot()).toEqual({ color: "green", totalUsers: 0, controllerIdentity: null });
});

test("observer requests do not reach other clients", async ({ server }) => {
  const alice = await openClient(server.port(), "alice");
  await vi.waitFor(() => expect(alice.messages).toHaveLength(2));
  const bob = await openClient(server.port(), "bob");
  await vi.waitFor(() => expect(alice.messages).toHaveLength(3));

  bob.ws.send(JSON.stringify({ type: "color_change", color: "green" }));
  alice.ws.send(JSON.stringify({ type: "color_change", color: "yellow" }));

  await vi.waitFor(() => expect(bob.messages.at(-1)).toMatchObject({ type: "color_change", color: "yellow" }));
  expect(bob.messages.filter((m) => m.type === "color_change")).toHaveLength(1);
});

test("a connection refuses sends once its socket is gone", async ({ server, coordinator }) => {
  const connect = vi.spyOn(coordinator, "connect");
  const alice = await openClient(server.port(), "alice");
  await vi.waitFor(() => expect(connect).toHaveBeenCalledTimes(1));
  const connection = connect.mock.calls[0]![0];

  alice.ws.terminate();
  await vi.waitFor(() => expect(coordinator.statusSnapshot().totalUsers).toBe(0));

  expect(() => connection.send("{}")).toThrow("WebSocket is not open");
});

test("stop disconnects every remaining client once", async ({ coordinator }) => {
  const server = await startServer(coordinator);
  const disconnect = vi.spyOn(coordinator, "disconnect");
  const alice = await openClient(server.port(), "alice");
  const bob = await openClient(server.port(), "bob");
  await vi.waitFor(() => expect(bob.messages).toHaveLength(2));

  await server.stop();

  await vi.waitFor(() => expect(disconnect).toHaveBeenCalledTimes(2));
  expect(coordinator.statusSnapshot().totalUsers).toBe(0);
  await vi.waitFor(() => expect(alice.ws.readyState).toBe(WebSocket.CLOSED));
});
