import { EmbeddedMcpServer } from "../../src/adapters/mcp/mcp.embedded";
import type { ServerConfig, StartStatus, StopStatus } from "../../src/adapters/mcp/mcp.types";
import type { HostProgram, HostWorkspace } from "../../src/host/host.types";
import { SessionAdapter } from "../../src/session/session.adapter";
import { createToolRegistry, type ToolRegistry } from "../../src/tools/tool.registry";
import { resolveServerConfig, type ServerConfigEnv } from "../config/server.config";

export interface ManagedServer {
  start(): Promise<StartStatus>;
  stop(): Promise<StopStatus>;
}

export type ServerFactory = (registry: ToolRegistry, config: ServerConfig) => ManagedServer;

export interface HostPluginOptions {
  readonly session?: SessionAdapter;
  readonly env?: ServerConfigEnv;
  readonly createServer?: ServerFactory;
}

const createEmbeddedServer: ServerFactory = (registry, config) =>
  new EmbeddedMcpServer(registry, config);

/**
 * Entry point the analysis GUI drives. Keeps the session bound to whatever
 * the GUI has open and runs the embedded MCP server while the plugin lives.
 */
export class HostPlugin {
  static readonly DISPLAY_NAME = "KB Session MCP";

  readonly session: SessionAdapter;
  private readonly server: ManagedServer;
  private serverStarted = false;
  private starting: Promise<void> | null = null;

  constructor(workspace: HostWorkspace | null = null, options: HostPluginOptions = {}) {
    this.session = options.session ?? new SessionAdapter();
    if (workspace !== null) {
      this.session.bindWorkspace(workspace);
    }
    const config = resolveServerConfig({}, options.env ?? process.env);
    const factory = options.createServer ?? createEmbeddedServer;
    this.server = factory(createToolRegistry(this.session), config);
  }

  async onWorkspaceInitialized(workspace: HostWorkspace): Promise<void> {
    this.session.bindWorkspace(workspace);
    this.refreshActiveContext();
    await this.ensureServerStarted();
  }

  async onWorkspaceChanged(workspace: HostWorkspace): Promise<void> {
    this.session.bindWorkspace(workspace);
    this.refreshActiveContext();
    await this.ensureServerStarted();
  }

  async onProjectOpened(project: HostProgram | null): Promise<void> {
    this.session.setProject(project);
    this.refreshActiveContext();
    await this.ensureServerStarted();
  }

  onProjectUpdated(project: HostProgram | null): void {
    this.session.setProject(project);
    this.refreshActiveContext();
  }

  async teardown(): Promise<void> {
    if (this.starting !== null) {
      await this.starting;
    }
    await this.server.stop();
    this.serverStarted = false;
  }

  deactivate(): Promise<void> {
    return this.teardown();
  }

  /** Re-extracts the program from the bound workspace, if there is one. */
  refreshActiveContext(): void {
    const workspace = this.session.getWorkspace();
    if (workspace !== null) {
      this.session.bindWorkspace(workspace);
    }
  }

  /**
   * Lifecycle events may overlap, so the in-flight start is shared. A failed
   * start is logged and left for the next event to retry.
   */
  private ensureServerStarted(): Promise<void> {
    if (this.serverStarted) {
      return Promise.resolve();
    }
    this.starting ??= this.startServer().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async startServer(): Promise<void> {
    try {
      const status = await this.server.start();
      console.warn(`[plugin] server start: ${JSON.stringify(status)}`);
      this.serverStarted = true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[plugin] server start failed: ${message}`);
    }
  }
}
