import { SQLiteStorage, type SQLiteStorageOptions } from "./sqlite.storage";

export type ProgramMetaKey = "filename" | "binary" | "architecture" | "entry";

export interface FunctionRecord {
  readonly address: number;
  readonly name: string | null;
  readonly size: number | null;
  readonly isPlt: boolean;
  readonly isSyscall: boolean;
}

export interface StringRecord {
  readonly address: number;
  readonly value: string;
}

export interface CommentRecord {
  readonly address: number;
  readonly text: string;
}

export interface XrefRecord {
  readonly src: number;
  readonly dst: number;
  readonly type: string;
}

type FunctionRow = {
  address: number;
  name: string | null;
  size: number | null;
  is_plt: number;
  is_syscall: number;
};

function toSQLiteBool(value: boolean): number {
  return value ? 1 : 0;
}

function fromFunctionRow(row: FunctionRow): FunctionRecord {
  return {
    address: row.address,
    name: typeof row.name === "string" ? row.name : null,
    size: typeof row.size === "number" ? row.size : null,
    isPlt: row.is_plt === 1,
    isSyscall: row.is_syscall === 1,
  };
}

export class ProgramMetaStore {
  constructor(private readonly storage: SQLiteStorage) {}

  get(key: ProgramMetaKey): string | null {
    const row = this.storage.query<{ value: string | null }>(
      "SELECT value FROM program_meta WHERE key = ?",
      [key]
    )[0];
    return row === undefined ? null : row.value;
  }

  set(key: ProgramMetaKey, value: string | null): void {
    this.storage.exec(
      "INSERT INTO program_meta(key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      [key, value]
    );
  }
}

export class FunctionStore {
  constructor(private readonly storage: SQLiteStorage) {}

  upsert(record: FunctionRecord): void {
    this.storage.exec(
      `INSERT INTO functions(address, name, size, is_plt, is_syscall) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(address) DO UPDATE SET
         name = excluded.name, size = excluded.size,
         is_plt = excluded.is_plt, is_syscall = excluded.is_syscall`,
      [
        record.address,
        record.name,
        record.size,
        toSQLiteBool(record.isPlt),
        toSQLiteBool(record.isSyscall),
      ]
    );
  }

  get(address: number): FunctionRecord | null {
    const row = this.storage.query<FunctionRow>(
      "SELECT address, name, size, is_plt, is_syscall FROM functions WHERE address = ?",
      [address]
    )[0];
    return row === undefined ? null : fromFunctionRow(row);
  }

  list(): readonly FunctionRecord[] {
    return this.storage
      .query<FunctionRow>(
        "SELECT address, name, size, is_plt, is_syscall FROM functions ORDER BY address ASC"
      )
      .map(fromFunctionRow);
  }

  rename(address: number, name: string | null): void {
    const result = this.storage.exec("UPDATE functions SET name = ? WHERE address = ?", [
      name,
      address,
    ]);
    if (readChanges(result) === 0) {
      throw new Error(`FUNCTION_STORE_ERROR no function at address ${address}`);
    }
  }
}

export class StringStore {
  constructor(private readonly storage: SQLiteStorage) {}

  upsert(record: StringRecord): void {
    this.storage.exec(
      "INSERT INTO strings(address, value) VALUES (?, ?) ON CONFLICT(address) DO UPDATE SET value = excluded.value",
      [record.address, record.value]
    );
  }

  list(): readonly StringRecord[] {
    return this.storage.query<{ address: number; value: string }>(
      "SELECT address, value FROM strings ORDER BY address ASC"
    );
  }
}

export class CommentStore {
  constructor(private readonly storage: SQLiteStorage) {}

  get(address: number): string | null {
    const row = this.storage.query<{ text: string }>(
      "SELECT text FROM comments WHERE address = ?",
      [address]
    )[0];
    return row === undefined ? null : row.text;
  }

  set(address: number, text: string): void {
    this.storage.exec(
      "INSERT INTO comments(address, text) VALUES (?, ?) ON CONFLICT(address) DO UPDATE SET text = excluded.text",
      [address, text]
    );
  }

  list(): readonly CommentRecord[] {
    return this.storage.query<{ address: number; text: string }>(
      "SELECT address, text FROM comments ORDER BY address ASC"
    );
  }
}

export class XrefStore {
  constructor(private readonly storage: SQLiteStorage) {}

  insert(record: XrefRecord): void {
    this.storage.exec("INSERT OR IGNORE INTO xrefs(src, dst, type) VALUES (?, ?, ?)", [
      record.src,
      record.dst,
      record.type,
    ]);
  }

  listByDst(dst: number): readonly XrefRecord[] {
    return this.storage.query<{ src: number; dst: number; type: string }>(
      "SELECT src, dst, type FROM xrefs WHERE dst = ? ORDER BY src ASC, type ASC",
      [dst]
    );
  }
}

function readChanges(result: unknown): number {
  if (typeof result !== "object" || result === null || !("changes" in result)) {
    return 0;
  }
  const { changes } = result;
  return typeof changes === "number" ? changes : Number(changes);
}

export interface SQLiteStorageLayer {
  readonly storage: SQLiteStorage;
  readonly meta: ProgramMetaStore;
  readonly functions: FunctionStore;
  readonly strings: StringStore;
  readonly comments: CommentStore;
  readonly xrefs: XrefStore;
}

export function createSQLiteStorageLayer(options: SQLiteStorageOptions): SQLiteStorageLayer {
  const storage = new SQLiteStorage(options);
  storage.connect();

  return {
    storage,
    meta: new ProgramMetaStore(storage),
    functions: new FunctionStore(storage),
    strings: new StringStore(storage),
    comments: new CommentStore(storage),
    xrefs: new XrefStore(storage),
  };
}

export interface ProgramSeed {
  readonly filename?: string | null;
  readonly binary?: string | null;
  readonly architecture?: string | null;
  readonly entry?: number | null;
  readonly functions?: readonly FunctionRecord[];
  readonly strings?: readonly StringRecord[];
  readonly comments?: readonly CommentRecord[];
  readonly xrefs?: readonly XrefRecord[];
}

/** Writes a program into an open layer in one transaction. */
export function seedProgramDatabase(layer: SQLiteStorageLayer, seed: ProgramSeed): void {
  layer.storage.transaction(() => {
    layer.meta.set("filename", seed.filename ?? null);
    layer.meta.set("binary", seed.binary ?? null);
    layer.meta.set("architecture", seed.architecture ?? null);
    layer.meta.set(
      "entry",
      typeof seed.entry === "number" && Number.isInteger(seed.entry) ? String(seed.entry) : null
    );
    for (const record of seed.functions ?? []) {
      layer.functions.upsert(record);
    }
    for (const record of seed.strings ?? []) {
      layer.strings.upsert(record);
    }
    for (const record of seed.comments ?? []) {
      layer.comments.set(record.address, record.text);
    }
    for (const record of seed.xrefs ?? []) {
      layer.xrefs.insert(record);
    }
  });
}
