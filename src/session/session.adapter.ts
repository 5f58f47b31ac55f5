import { isCallable, readPath, readProperty } from "../core/_shared/probe";
import { NoActiveProgramError } from "../core/errors/errors";
import { isHostProgram } from "../host/host.guards";
import type { HostProgram, HostWorkspace } from "../host/host.types";
import { deriveProgramDescriptor } from "./program_descriptor";
import { ReentrantLock } from "./session.lock";
import type {
  ProgramDescriptor,
  ProgramLoader,
  RefreshResult,
  ResolvedProgram,
} from "./session.types";

export interface ProgramAccessor {
  readonly label: string;
  resolve(workspace: HostWorkspace): unknown;
}

export interface RefreshHook {
  readonly label: string;
  /** Owner the hook is invoked on, so methods keep their receiver. */
  readonly owner: readonly string[];
  readonly method: string;
}

/** Tried in order; the first candidate with a program shape wins. */
export const PROGRAM_ACCESSORS: readonly ProgramAccessor[] = Object.freeze([
  { label: "workspace.project", resolve: (ws: HostWorkspace) => readProperty(ws, "project") },
  { label: "workspace.mainInstance", resolve: (ws: HostWorkspace) => readProperty(ws, "mainInstance") },
  {
    label: "workspace.mainInstance.project",
    resolve: (ws: HostWorkspace) => readPath(ws, ["mainInstance", "project"]),
  },
  {
    label: "workspace.instance.project",
    resolve: (ws: HostWorkspace) => readPath(ws, ["instance", "project"]),
  },
]);

export const REFRESH_HOOKS: readonly RefreshHook[] = Object.freeze([
  { label: "workspace.reload", owner: [], method: "reload" },
  { label: "workspace.refresh", owner: [], method: "refresh" },
  { label: "workspace.viewManager.reload", owner: ["viewManager"], method: "reload" },
  { label: "workspace.viewManager.refresh", owner: ["viewManager"], method: "refresh" },
  { label: "workspace.mainInstance.refresh", owner: ["mainInstance"], method: "refresh" },
]);

export interface SessionAdapterOptions {
  readonly loader?: ProgramLoader;
  readonly accessors?: readonly ProgramAccessor[];
  readonly refreshHooks?: readonly RefreshHook[];
}

export function extractProgram(
  workspace: HostWorkspace,
  accessors: readonly ProgramAccessor[] = PROGRAM_ACCESSORS
): HostProgram | null {
  for (const accessor of accessors) {
    const candidate = accessor.resolve(workspace);
    if (isHostProgram(candidate)) {
      return candidate;
    }
  }
  return null;
}

export class SessionAdapter {
  private readonly lock = new ReentrantLock();
  private readonly loader?: ProgramLoader;
  private readonly accessors: readonly ProgramAccessor[];
  private readonly refreshHooks: readonly RefreshHook[];
  private workspace: HostWorkspace | null = null;
  private project: HostProgram | null = null;

  constructor(options: SessionAdapterOptions = {}) {
    this.loader = options.loader;
    this.accessors = options.accessors ?? PROGRAM_ACCESSORS;
    this.refreshHooks = options.refreshHooks ?? REFRESH_HOOKS;
  }

  bindWorkspace(workspace: HostWorkspace): void {
    this.lock.run(() => {
      this.workspace = workspace;
      const extracted = extractProgram(workspace, this.accessors);
      if (extracted !== null) {
        this.project = extracted;
      }
    });
  }

  setProject(project: HostProgram | null): void {
    this.lock.run(() => {
      this.project = project;
    });
  }

  getWorkspace(): HostWorkspace | null {
    return this.lock.run(() => this.workspace);
  }

  getProject(): HostProgram | null {
    return this.lock.run(() => {
      if (this.project === null && this.workspace !== null) {
        this.project = extractProgram(this.workspace, this.accessors);
      }
      return this.project;
    });
  }

  requireProject(): HostProgram {
    return this.lock.run(() => {
      const project = this.getProject();
      if (project === null) {
        throw new NoActiveProgramError();
      }
      return project;
    });
  }

  /**
   * With a path override, opens an ephemeral program through the loader and
   * leaves the bound session untouched.
   */
  resolveProject(pathOverride?: string | null): ResolvedProgram {
    if (typeof pathOverride === "string" && pathOverride.trim() !== "") {
      if (!this.loader) {
        throw new NoActiveProgramError(
          `no program loader is configured to open ${pathOverride}`
        );
      }
      return this.loader.open(pathOverride);
    }
    return { program: this.requireProject(), release: () => undefined };
  }

  getProgramDescriptor(): ProgramDescriptor {
    return deriveProgramDescriptor(this.getProject());
  }

  refreshGui(): RefreshResult {
    const workspace = this.getWorkspace();
    if (workspace === null) {
      return { updated: false, reason: "no_workspace_bound" };
    }

    for (const hook of this.refreshHooks) {
      const owner = hook.owner.length === 0 ? workspace : readPath(workspace, hook.owner);
      const method = readProperty(owner, hook.method);
      if (!isCallable(method)) {
        continue;
      }
      try {
        Reflect.apply(method, owner, []);
        return { updated: true, hook: hook.label };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[session] refresh hook ${hook.label} failed: ${message}`);
      }
    }
    return { updated: false, reason: "no_supported_refresh_hook_found" };
  }
}
