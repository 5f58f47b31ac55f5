import type { HostProgram } from "../host/host.types";

export type ProgramDescriptor = {
  readonly name: string | null;
  readonly path: string | null;
  readonly architecture: string | null;
  readonly entry: number | null;
};

export type RefreshResult =
  | {
      readonly updated: true;
      readonly hook: string;
    }
  | {
      readonly updated: false;
      readonly reason: "no_workspace_bound" | "no_supported_refresh_hook_found";
    };

/** A program handle the caller must release once the operation is over. */
export interface ResolvedProgram {
  readonly program: HostProgram;
  release(): void;
}

/** Opens an ephemeral program from a path, bypassing the bound session. */
export interface ProgramLoader {
  open(path: string): ResolvedProgram;
}
