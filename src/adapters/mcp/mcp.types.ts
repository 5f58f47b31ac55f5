export const MCP_TRANSPORTS = ["stdio", "streamable-http"] as const;

export type McpTransport = (typeof MCP_TRANSPORTS)[number];

export interface ServerConfig {
  readonly transport: McpTransport;
  readonly host: string;
  readonly port: number;
}

export const SERVER_INFO = Object.freeze({ name: "kb-session-mcp", version: "0.1.0" });

export type StartStatus =
  | { readonly started: true; readonly transport: McpTransport; readonly url: string }
  | { readonly started: false; readonly reason: "already_running"; readonly url: string };

export type StopStatus =
  | { readonly stopped: true }
  | { readonly stopped: false; readonly reason: "not_running" };
