import type {
  CommentTable,
  FunctionTable,
  HostFunction,
  HostProgram,
  HostXref,
  KnowledgeBase,
  StringTableItem,
  XrefIndex,
} from "../../../host/host.types";
import type { ProgramLoader, ResolvedProgram } from "../../../session/session.types";
import {
  createSQLiteStorageLayer,
  type FunctionRecord,
  type FunctionStore,
  type SQLiteStorageLayer,
} from "./sqlite.stores";

/** Writes through to the database when the name is assigned. */
class StoredFunction implements HostFunction {
  readonly size: number | null;
  readonly isPlt: boolean;
  readonly isSyscall: boolean;
  private currentName: string | null;

  constructor(
    private readonly store: FunctionStore,
    private readonly address: number,
    record: FunctionRecord
  ) {
    this.size = record.size;
    this.isPlt = record.isPlt;
    this.isSyscall = record.isSyscall;
    this.currentName = record.name;
  }

  get name(): string | null {
    return this.currentName;
  }

  set name(value: string | null) {
    this.store.rename(this.address, value);
    this.currentName = value;
  }
}

function functionTable(layer: SQLiteStorageLayer): FunctionTable {
  const wrap = (record: FunctionRecord): readonly [number, HostFunction] => [
    record.address,
    new StoredFunction(layer.functions, record.address, record),
  ];
  return {
    has: (address) => layer.functions.get(address) !== null,
    get(address) {
      const record = layer.functions.get(address);
      return record === null ? undefined : wrap(record)[1];
    },
    entries: () => layer.functions.list().map(wrap),
  };
}

function commentTable(layer: SQLiteStorageLayer): CommentTable {
  return {
    get: (address) => layer.comments.get(address) ?? undefined,
    set: (address, text) => layer.comments.set(address, text),
    entries: () =>
      layer.comments.list().map((row): readonly [number, string] => [row.address, row.text]),
  };
}

function xrefIndex(layer: SQLiteStorageLayer): XrefIndex {
  return {
    getXrefsByDst: (address) =>
      layer.xrefs
        .listByDst(address)
        .map((row): HostXref => ({ insAddr: row.src, dst: row.dst, type: row.type })),
  };
}

function parseEntry(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value)) {
    return null;
  }
  const entry = Number(value);
  return Number.isSafeInteger(entry) ? entry : null;
}

export interface ProgramDatabase {
  readonly program: HostProgram;
  readonly layer: SQLiteStorageLayer;
  close(): void;
}

export interface OpenProgramDatabaseOptions {
  readonly ["readonly"]?: boolean;
}

/**
 * Exposes a program database through the host program shape. The database
 * carries no analysis engine, so CFG, exploration and decompilation report
 * themselves unavailable.
 */
export function openProgramDatabase(
  dbPath: string,
  options: OpenProgramDatabaseOptions = {}
): ProgramDatabase {
  const layer = createSQLiteStorageLayer({ dbPath, readonly: options["readonly"] === true });
  const kb: KnowledgeBase = {
    functions: functionTable(layer),
    comments: commentTable(layer),
    strings: {
      [Symbol.iterator]: (): Iterator<StringTableItem> =>
        layer.strings
          .list()
          .map((row): StringTableItem => [row.address, row.value])
          [Symbol.iterator](),
    },
    xrefs: xrefIndex(layer),
  };
  const program: HostProgram = {
    filename: layer.meta.get("filename"),
    loader: {
      mainObject: {
        binary: layer.meta.get("binary"),
        entry: parseEntry(layer.meta.get("entry")),
      },
    },
    arch: { name: layer.meta.get("architecture") },
    kb,
    analyses: null,
  };
  return { program, layer, close: () => layer.storage.close() };
}

/** Opens read-only databases for per-call path overrides. */
export function createProgramDatabaseLoader(): ProgramLoader {
  return {
    open(path: string): ResolvedProgram {
      const database = openProgramDatabase(path, { readonly: true });
      return { program: database.program, release: () => database.close() };
    },
  };
}
