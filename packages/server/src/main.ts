import { config as loadEnv } from "dotenv";

import {
  createConnectionRegistry,
  createSignalCoordinator,
  createWsServer,
  loadServerConfig,
} from "./index.js";

loadEnv();

const { port, host } = loadServerConfig(process.env);

const coordinator = createSignalCoordinator({
  registry: createConnectionRegistry(),
  now: () => new Date(),
});

const server = createWsServer({ port, host, coordinator });
await server.start();

console.log(`Server listening on http://${host}:${port}`);

function shutdown(signal: NodeJS.Signals): void {
  console.log(`Received ${signal}, shutting down`);
  server.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    },
  );
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
