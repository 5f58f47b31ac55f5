import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { ToolRegistry } from "../../tools/tool.registry";
import { createMcpServer } from "./mcp.server";

export const MCP_PATH = "/mcp";
export const HEALTH_PATH = "/health";

interface JsonObject {
  readonly [key: string]: unknown;
}

function sendJson(res: ServerResponse, statusCode: number, payload: JsonObject): void {
  const body = `${JSON.stringify(payload)}\n`;
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "content-length": String(Buffer.byteLength(body, "utf8")),
    "cache-control": "no-store",
  });
  res.end(body);
}

function sendJsonRpcError(res: ServerResponse, statusCode: number, code: number, message: string): void {
  sendJson(res, statusCode, { jsonrpc: "2.0", error: { code, message }, id: null });
}

/** Same limit the MCP SDK applies when it reads bodies itself. */
export const MAX_BODY_BYTES = 4 * 1024 * 1024;

export interface McpHttpServerOptions {
  readonly maxBodyBytes?: number;
}

class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`MCP_HTTP_ERROR request body exceeds ${String(limit)} bytes`);
    this.name = "BodyTooLargeError";
  }
}

async function readJsonBody(req: IncomingMessage, maxBodyBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let received = 0;
  // The stream is drained past the limit so the socket can still carry the 413.
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    received += buffer.length;
    if (received <= maxBodyBytes) {
      chunks.push(buffer);
    }
  }
  if (received > maxBodyBytes) {
    throw new BodyTooLargeError(maxBodyBytes);
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (raw.trim() === "") {
    return undefined;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/** Stateless: every POST gets its own server and transport. */
async function handleMcpPost(
  registry: ToolRegistry,
  req: IncomingMessage,
  res: ServerResponse,
  maxBodyBytes: number
): Promise<void> {
  let body: unknown;
  try {
    body = await readJsonBody(req, maxBodyBytes);
  } catch (error) {
    if (error instanceof BodyTooLargeError) {
      sendJsonRpcError(res, 413, -32600, "Request body too large");
      return;
    }
    sendJsonRpcError(res, 400, -32700, "Parse error");
    return;
  }

  const server = createMcpServer(registry);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    transport.close().catch((error: unknown) => {
      console.warn(`[mcp] transport close failed: ${String(error)}`);
    });
    server.close().catch((error: unknown) => {
      console.warn(`[mcp] server close failed: ${String(error)}`);
    });
  });
  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

export function createMcpHttpServer(
  registry: ToolRegistry,
  options: McpHttpServerOptions = {}
): http.Server {
  const maxBodyBytes = options.maxBodyBytes ?? MAX_BODY_BYTES;
  return http.createServer((req, res) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    const route = async (): Promise<void> => {
      if (pathname === HEALTH_PATH && req.method === "GET") {
        sendJson(res, 200, { status: "ok", tools: registry.list().length });
        return;
      }
      if (pathname !== MCP_PATH) {
        sendJson(res, 404, { error: "NOT_FOUND" });
        return;
      }
      if (req.method !== "POST") {
        sendJsonRpcError(res, 405, -32000, "Method not allowed");
        return;
      }
      await handleMcpPost(registry, req, res, maxBodyBytes);
    };

    route().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[mcp] request ${req.method ?? "?"} ${pathname} failed: ${message}`);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, -32603, "Internal server error");
      }
    });
  });
}

export function listen(server: http.Server, host: string, port: number): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`MCP_HTTP_ERROR unexpected listen address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
