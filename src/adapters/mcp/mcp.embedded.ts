import type http from "node:http";
import { ConfigurationError } from "../../core/errors/errors";
import type { ToolRegistry } from "../../tools/tool.registry";
import { MCP_PATH, closeServer, createMcpHttpServer, listen } from "./mcp.http";
import type { ServerConfig, StartStatus, StopStatus } from "./mcp.types";

/**
 * HTTP server that lives inside the host process. stdio belongs to the host,
 * so only streamable-http is accepted here.
 */
export class EmbeddedMcpServer {
  private httpServer: http.Server | null = null;
  private url: string | null = null;
  private starting: Promise<StartStatus> | null = null;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly config: ServerConfig
  ) {
    if (config.transport === "stdio") {
      throw new ConfigurationError(
        "the embedded server cannot use the stdio transport; use streamable-http"
      );
    }
  }

  get running(): boolean {
    return this.httpServer !== null;
  }

  /** Concurrent calls share one in-flight listen. */
  start(): Promise<StartStatus> {
    if (this.httpServer !== null && this.url !== null) {
      const status: StartStatus = { started: false, reason: "already_running", url: this.url };
      return Promise.resolve(status);
    }
    this.starting ??= this.listenOnce().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async listenOnce(): Promise<StartStatus> {
    const server = createMcpHttpServer(this.registry);
    const address = await listen(server, this.config.host, this.config.port);
    const url = `http://${this.config.host}:${String(address.port)}${MCP_PATH}`;
    this.httpServer = server;
    this.url = url;
    console.warn(`[mcp] listening on ${url}`);
    return { started: true, transport: this.config.transport, url };
  }

  async stop(): Promise<StopStatus> {
    if (this.starting !== null) {
      await Promise.allSettled([this.starting]);
    }
    const server = this.httpServer;
    if (server === null) {
      return { stopped: false, reason: "not_running" };
    }
    this.httpServer = null;
    this.url = null;
    await closeServer(server);
    console.warn("[mcp] stopped");
    return { stopped: true };
  }
}
