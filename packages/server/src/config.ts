export interface ServerConfig {
  port: number;
  host: string;
}

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "0.0.0.0";

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  return {
    port: parsePort(env["PORT"]),
    host: env["HOST"] || DEFAULT_HOST,
  };
}
