import { ConfigurationError } from "../../src/core/errors/errors";
import {
  MCP_TRANSPORTS,
  type McpTransport,
  type ServerConfig,
} from "../../src/adapters/mcp/mcp.types";

export interface ServerConfigArgs {
  readonly transport?: string;
  readonly host?: string;
  readonly port?: string | number;
}

export interface ServerConfigEnv {
  readonly SESSION_MCP_TRANSPORT?: string;
  readonly SESSION_MCP_HOST?: string;
  readonly SESSION_MCP_PORT?: string;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = Object.freeze({
  transport: "streamable-http",
  host: "127.0.0.1",
  port: 8766,
});

const MAX_PORT = 65535;

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function isMcpTransport(value: string): value is McpTransport {
  return (MCP_TRANSPORTS as readonly string[]).includes(value);
}

function parseTransport(value: string): McpTransport {
  const normalized = value.toLowerCase();
  if (isMcpTransport(normalized)) {
    return normalized;
  }
  throw new ConfigurationError(
    `unsupported transport='${value}'. expected one of: ${MCP_TRANSPORTS.join("|")}`
  );
}

/** Port 0 asks the OS for a free port. */
function parsePort(value: string | number): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 0 || port > MAX_PORT) {
    throw new ConfigurationError(`port must be an integer in 0..${MAX_PORT}, got '${String(value)}'`);
  }
  return port;
}

/** Flags win over environment variables, which win over defaults. */
export function resolveServerConfig(
  args: ServerConfigArgs,
  env: ServerConfigEnv
): ServerConfig {
  const transportRaw = toTrimmedString(args.transport) ?? toTrimmedString(env.SESSION_MCP_TRANSPORT);
  const host =
    toTrimmedString(args.host) ?? toTrimmedString(env.SESSION_MCP_HOST) ?? DEFAULT_SERVER_CONFIG.host;
  const portRaw =
    typeof args.port === "number" ? args.port : toTrimmedString(args.port) ?? toTrimmedString(env.SESSION_MCP_PORT);

  return {
    transport: transportRaw === undefined ? DEFAULT_SERVER_CONFIG.transport : parseTransport(transportRaw),
    host,
    port: portRaw === undefined ? DEFAULT_SERVER_CONFIG.port : parsePort(portRaw),
  };
}
