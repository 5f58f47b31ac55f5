/**
 * Shapes the analysis host exposes. Every field is optional: host versions
 * differ, and readers go through the guards in `host.guards.ts` before
 * touching a table.
 */

export type Address = number;

export interface HostFunction {
  name?: string | null;
  readonly size?: number | null;
  readonly isPlt?: boolean;
  readonly isSyscall?: boolean;
}

export interface FunctionTable {
  has(address: Address): boolean;
  get(address: Address): HostFunction | undefined;
  entries(): Iterable<readonly [Address, HostFunction]>;
}

export interface CommentTable {
  get(address: Address): string | undefined;
  set(address: Address, text: string): unknown;
  entries(): Iterable<readonly [Address, string]>;
}

export interface HostStringEntry {
  readonly addr?: Address | null;
  readonly string?: string | null;
}

export type StringTableItem = readonly [Address, string] | HostStringEntry | string;

export type StringTable = Iterable<StringTableItem>;

export interface HostXref {
  readonly insAddr?: Address | null;
  readonly dst?: Address | null;
  readonly type?: string | null;
}

export interface XrefIndex {
  getXrefsByDst(address: Address): Iterable<HostXref>;
}

export interface KnowledgeBase {
  readonly functions?: FunctionTable | null;
  readonly strings?: StringTable | null;
  readonly comments?: CommentTable | null;
  readonly xrefs?: XrefIndex | null;
}

export interface CfgGraph {
  numberOfNodes(): number;
  numberOfEdges(): number;
}

export interface CfgResult {
  readonly graph?: CfgGraph | null;
}

export interface DecompileResult {
  readonly text?: string | null;
}

export interface ExploreRequest {
  readonly findAddress: Address;
  readonly avoidAddresses: readonly Address[];
  /** Size of the symbolic stdin buffer, or null for concrete stdin. */
  readonly symbolicStdinBytes: number | null;
}

export interface ExploreResult {
  readonly found: number;
  readonly active: number;
  readonly deadended: number;
  readonly stdinSolution?: Uint8Array | null;
}

/** Long-running engine entry points. A value or a promise is accepted from each. */
export interface AnalysisEngine {
  cfgFast?(options: { readonly normalize: boolean }): Promise<CfgResult> | CfgResult;
  decompile?(address: Address): Promise<DecompileResult> | DecompileResult;
  explore?(request: ExploreRequest): Promise<ExploreResult> | ExploreResult;
}

export interface HostMainObject {
  readonly entry?: number | null;
  readonly binary?: string | null;
}

export interface HostProgram {
  readonly filename?: string | null;
  readonly loader?: { readonly mainObject?: HostMainObject | null } | null;
  readonly arch?: { readonly name?: string | null } | null;
  readonly kb?: KnowledgeBase | null;
  readonly analyses?: AnalysisEngine | null;
}

/**
 * Host GUI session. Opaque on purpose: the adapter only probes it.
 */
export type HostWorkspace = object;
