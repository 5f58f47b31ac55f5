import type {
  Address,
  AnalysisEngine,
  CommentTable,
  FunctionTable,
  HostFunction,
  HostProgram,
  HostXref,
  StringTableItem,
  XrefIndex,
} from "./host.types";

export interface InMemoryFunction {
  readonly address: Address;
  readonly name?: string | null;
  readonly size?: number | null;
  readonly isPlt?: boolean;
  readonly isSyscall?: boolean;
}

export interface InMemoryProgramSeed {
  readonly filename?: string | null;
  readonly binary?: string | null;
  readonly architecture?: string | null;
  readonly entry?: number | null;
  readonly functions?: readonly InMemoryFunction[];
  readonly strings?: readonly StringTableItem[];
  readonly comments?: readonly (readonly [Address, string])[];
  readonly xrefs?: readonly { readonly src: Address; readonly dst: Address; readonly type: string }[];
  readonly analyses?: AnalysisEngine | null;
}

export class InMemoryFunctionTable implements FunctionTable {
  private readonly functions = new Map<Address, HostFunction>();

  constructor(seed: readonly InMemoryFunction[] = []) {
    for (const { address, ...func } of seed) {
      this.functions.set(address, { ...func });
    }
  }

  has(address: Address): boolean {
    return this.functions.has(address);
  }

  get(address: Address): HostFunction | undefined {
    return this.functions.get(address);
  }

  entries(): Iterable<readonly [Address, HostFunction]> {
    return [...this.functions.entries()].sort(([a], [b]) => a - b);
  }
}

export class InMemoryCommentTable implements CommentTable {
  private readonly comments: Map<Address, string>;

  constructor(seed: readonly (readonly [Address, string])[] = []) {
    this.comments = new Map(seed);
  }

  get(address: Address): string | undefined {
    return this.comments.get(address);
  }

  set(address: Address, text: string): void {
    this.comments.set(address, text);
  }

  entries(): Iterable<readonly [Address, string]> {
    return [...this.comments.entries()];
  }
}

function xrefIndex(
  xrefs: readonly { readonly src: Address; readonly dst: Address; readonly type: string }[]
): XrefIndex {
  return {
    getXrefsByDst: (address) =>
      xrefs
        .filter((ref) => ref.dst === address)
        .map((ref): HostXref => ({ insAddr: ref.src, dst: ref.dst, type: ref.type })),
  };
}

export function createInMemoryProgram(seed: InMemoryProgramSeed = {}): HostProgram {
  return {
    filename: seed.filename ?? null,
    loader: { mainObject: { binary: seed.binary ?? null, entry: seed.entry ?? null } },
    arch: { name: seed.architecture ?? null },
    kb: {
      functions: new InMemoryFunctionTable(seed.functions),
      strings: [...(seed.strings ?? [])],
      comments: new InMemoryCommentTable(seed.comments),
      xrefs: xrefIndex(seed.xrefs ?? []),
    },
    analyses: seed.analyses ?? null,
  };
}
