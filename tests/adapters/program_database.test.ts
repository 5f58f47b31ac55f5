/**
 * Intent: a SQLite program database behaves as a host program, with names and
 * comments written through to disk.
 * Scope: SQLiteStorage boot and version gate, stores, openProgramDatabase, loader.
 * Non-Goals: analysis engine behavior; the database carries none.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  PROGRAM_DB_SCHEMA_VERSION,
  SQLiteStorage,
  createProgramDatabaseLoader,
  createSQLiteStorageLayer,
  openProgramDatabase,
  seedProgramDatabase,
} from "../../src/adapter/storage/sqlite";
import { functionTableOf, xrefIndexOf } from "../../src/host/host.guards";
import { deriveProgramDescriptor } from "../../src/session/program_descriptor";
import { stringRows } from "../../src/sync/snapshot.export";

function createTempDb(t: test.TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "program-db-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return path.join(dir, "program.db");
}

function seed(dbPath: string): void {
  const layer = createSQLiteStorageLayer({ dbPath });
  try {
    seedProgramDatabase(layer, {
      filename: "/bins/a.out",
      binary: "a.out",
      architecture: "AMD64",
      entry: 0x401000,
      functions: [
        { address: 0x401030, name: "main", size: 96, isPlt: false, isSyscall: false },
        { address: 0x401000, name: "_start", size: 48, isPlt: false, isSyscall: false },
      ],
      strings: [{ address: 0x402000, value: "hello" }],
      comments: [{ address: 0x401000, text: "entry" }],
      xrefs: [{ src: 0x401020, dst: 0x401030, type: "call" }],
    });
  } finally {
    layer.storage.close();
  }
}

test("boot creates the program tables and records the schema version", (t) => {
  const dbPath = createTempDb(t);
  const layer = createSQLiteStorageLayer({ dbPath });
  t.after(() => layer.storage.close());

  const tables = layer.storage
    .query<{ name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name ASC")
    .map((row) => row.name);
  assert.deepEqual(tables, [
    "comments",
    "functions",
    "program_meta",
    "schema_version",
    "strings",
    "xrefs",
  ]);
  assert.deepEqual(
    layer.storage.query<{ version: string }>("SELECT version FROM schema_version"),
    [{ version: PROGRAM_DB_SCHEMA_VERSION }]
  );
});

test("a database from another schema version is refused", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);
  const storage = new SQLiteStorage({ dbPath, expectedSchemaVersion: "2" });

  assert.throws(() => storage.connect(), {
    message: "SQLITE_STORAGE_VERSION_MISMATCH expected=2 actual=1",
  });
});

test("the opened program exposes descriptor, tables and xrefs", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);
  const database = openProgramDatabase(dbPath, { readonly: true });
  t.after(() => database.close());

  assert.deepEqual(deriveProgramDescriptor(database.program), {
    name: "a.out",
    path: "/bins/a.out",
    architecture: "AMD64",
    entry: 4198400,
  });
  const functions = functionTableOf(database.program);
  assert.ok(functions !== null);
  assert.deepEqual(
    [...functions.entries()].map(([address, func]) => [address, func.name]),
    [
      [0x401000, "_start"],
      [0x401030, "main"],
    ]
  );
  assert.deepEqual(stringRows(database.program), [{ address: "0x402000", value: "hello" }]);
  const xrefs = xrefIndexOf(database.program);
  assert.ok(xrefs !== null);
  assert.deepEqual([...xrefs.getXrefsByDst(0x401030)], [
    { insAddr: 0x401020, dst: 0x401030, type: "call" },
  ]);
});

test("renames and comments write through to disk", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);

  const writable = openProgramDatabase(dbPath);
  const func = writable.program.kb?.functions?.get(0x401030);
  assert.ok(func !== undefined);
  func.name = "real_main";
  writable.program.kb?.comments?.set(0x401030, "user code");
  writable.close();

  const reopened = openProgramDatabase(dbPath, { readonly: true });
  t.after(() => reopened.close());
  assert.equal(reopened.program.kb?.functions?.get(0x401030)?.name, "real_main");
  assert.equal(reopened.program.kb?.comments?.get(0x401030), "user code");
  assert.equal(reopened.program.kb?.comments?.get(0x401000), "entry");
});

test("a read-only database blocks writes", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);
  const database = openProgramDatabase(dbPath, { readonly: true });
  t.after(() => database.close());
  const func = database.program.kb?.functions?.get(0x401000);
  assert.ok(func !== undefined);

  assert.throws(
    () => {
      func.name = "renamed";
    },
    { message: "SQLITE_STORAGE_READONLY_WRITE_BLOCKED" }
  );
  assert.equal(func.name, "_start");
});

test("renaming a function that vanished from the table fails", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);
  const database = openProgramDatabase(dbPath);
  t.after(() => database.close());

  assert.throws(() => database.layer.functions.rename(0x999, "ghost"), {
    message: "FUNCTION_STORE_ERROR no function at address 2457",
  });
});

test("the loader opens a database and release closes it", (t) => {
  const dbPath = createTempDb(t);
  seed(dbPath);

  const resolved = createProgramDatabaseLoader().open(dbPath);
  assert.equal(deriveProgramDescriptor(resolved.program).name, "a.out");
  resolved.release();

  assert.throws(() => functionTableOf(resolved.program)?.has(0x401000), {
    message: "SQLITE_STORAGE_ERROR connection is closed",
  });
});

test("the loader refuses a path with no database", (t) => {
  const dbPath = createTempDb(t);

  assert.throws(() => createProgramDatabaseLoader().open(dbPath));
  assert.equal(fs.existsSync(dbPath), false);
});
