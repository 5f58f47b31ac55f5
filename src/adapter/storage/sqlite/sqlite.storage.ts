import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface Storage {
  connect(): void;
  close(): void;
  exec(sql: string, params?: readonly SQLiteParam[]): unknown;
  query<T extends Record<string, unknown>>(
    sql: string,
    params?: readonly SQLiteParam[]
  ): readonly T[];
  transaction<T>(run: () => T): T;
}

export interface SQLiteStorageOptions {
  readonly dbPath: string;
  readonly expectedSchemaVersion?: string;
  readonly ["readonly"]?: boolean;
}

export const PROGRAM_DB_SCHEMA_VERSION = "1";

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_PROGRAM_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS program_meta (
  key TEXT PRIMARY KEY CHECK(key IN ('filename', 'binary', 'architecture', 'entry')),
  value TEXT
);

CREATE TABLE IF NOT EXISTS functions (
  address INTEGER PRIMARY KEY,
  name TEXT,
  size INTEGER,
  is_plt INTEGER NOT NULL DEFAULT 0,
  is_syscall INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS strings (
  address INTEGER PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS comments (
  address INTEGER PRIMARY KEY,
  text TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS xrefs (
  src INTEGER NOT NULL,
  dst INTEGER NOT NULL,
  type TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (src, dst, type)
);

CREATE INDEX IF NOT EXISTS idx_xrefs_dst ON xrefs(dst);
`;

export class SQLiteStorage implements Storage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private readonly readOnlyMode: boolean;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions) {
    if (options.dbPath.trim() === "") {
      throw new Error("SQLITE_STORAGE_ERROR dbPath must be a non-empty path");
    }
    this.dbPath = path.resolve(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? PROGRAM_DB_SCHEMA_VERSION;
    this.readOnlyMode = options["readonly"] === true;
  }

  connect(): void {
    if (this.closed) {
      throw new Error("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw new Error("SQLITE_STORAGE_ERROR single connection already opened");
    }

    if (!this.readOnlyMode) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    const db = this.readOnlyMode
      ? new BetterSqlite3(this.dbPath, { readonly: true, fileMustExist: true })
      : new BetterSqlite3(this.dbPath);

    try {
      if (!this.readOnlyMode) {
        db.exec("PRAGMA journal_mode = WAL;");
        db.exec("PRAGMA synchronous = FULL;");
      }
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw error;
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): unknown {
    this.assertWritable();
    const db = this.requireDb();
    return db.prepare(sql).run(...params);
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    return db.prepare(sql).all(...params) as T[];
  }

  transaction<T>(run: () => T): T {
    this.assertWritable();
    return this.requireDb().transaction(run)();
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    if (!this.readOnlyMode) {
      db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);
    }

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (this.readOnlyMode) {
      this.assertSchemaVersionMatch(versions);
      return;
    }

    if (versions.length === 0) {
      db.exec("BEGIN TRANSACTION;");
      try {
        db.exec(CREATE_PROGRAM_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
        db.exec("COMMIT;");
      } catch (error) {
        db.exec("ROLLBACK;");
        throw error;
      }
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_PROGRAM_SCHEMA_SQL);
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw new Error(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private assertWritable(): void {
    if (this.readOnlyMode) {
      throw new Error("SQLITE_STORAGE_READONLY_WRITE_BLOCKED");
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw new Error("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw new Error("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
