/**
 * Intent: headless commands validate, export and import snapshots against a
 * program database with exit codes taken from the error policy.
 * Scope: runCli with captured output; temp SQLite databases and snapshot files.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  createSQLiteStorageLayer,
  openProgramDatabase,
  seedProgramDatabase,
} from "../../src/adapter/storage/sqlite";
import { readProperty } from "../../src/core/_shared/probe";
import { decodeSnapshot } from "../../src/sync/snapshot.codec";
import { USAGE } from "../../runtime/cli/cli.args";
import { runCli, type CliIo } from "../../runtime/cli/cli";

interface CapturedIo extends CliIo {
  readonly out: string[];
  readonly err: string[];
}

function captureIo(env: CliIo["env"] = {}): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    env,
    untilShutdown: async () => undefined,
  };
}

function workspace(t: test.TestContext): { readonly dir: string; readonly dbPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  const dbPath = path.join(dir, "program.db");
  const layer = createSQLiteStorageLayer({ dbPath });
  try {
    seedProgramDatabase(layer, {
      filename: "/bins/a.out",
      binary: "a.out",
      architecture: "AMD64",
      entry: 0x401000,
      functions: [{ address: 0x401000, name: "main", size: 32, isPlt: false, isSyscall: false }],
      strings: [{ address: 0x402000, value: "hello" }],
    });
  } finally {
    layer.storage.close();
  }
  return { dir, dbPath };
}

function functionName(dbPath: string, address: number): string | null | undefined {
  const database = openProgramDatabase(dbPath, { readonly: true });
  try {
    return database.program.kb?.functions?.get(address)?.name;
  } finally {
    database.close();
  }
}

function renamedSnapshot(snapshotText: string): string {
  const snapshot = decodeSnapshot(snapshotText);
  return JSON.stringify({
    ...snapshot,
    functions: snapshot.functions.map((row) => ({ ...row, name: "entry_main" })),
  });
}

test("help prints the usage", async () => {
  const io = captureIo();

  assert.equal(await runCli([], io), 0);
  assert.deepEqual(io.out, [`${USAGE}\n`]);
});

test("bad arguments exit with the configuration error code", async () => {
  const io = captureIo();

  assert.equal(await runCli(["export"], io), 64);
  assert.deepEqual(io.err, ["[cli] CONFIGURATION_ERROR --program is required\n"]);
});

test("export prints a snapshot of the program database", async (t) => {
  const { dbPath } = workspace(t);
  const io = captureIo();

  assert.equal(await runCli(["export", "--program", dbPath], io), 0);

  const snapshot = decodeSnapshot(io.out.join(""));
  assert.deepEqual(snapshot.program, {
    name: "a.out",
    path: "/bins/a.out",
    architecture: "AMD64",
    entry: 4198400,
  });
  assert.deepEqual(snapshot.functions, [{ address: "0x401000", name: "main", size: 32 }]);
  assert.deepEqual(snapshot.strings, [{ address: "0x402000", value: "hello" }]);
});

test("validate reports counts for a good file and the defect for a bad one", async (t) => {
  const { dir, dbPath } = workspace(t);
  const snapshotPath = path.join(dir, "snap.json");
  const exportIo = captureIo();
  assert.equal(await runCli(["export", "--program", dbPath, "--out", snapshotPath], exportIo), 0);
  assert.deepEqual(exportIo.err, [`[cli] snapshot written to ${snapshotPath}\n`]);

  const good = captureIo();
  assert.equal(await runCli(["validate", snapshotPath], good), 0);
  assert.deepEqual(JSON.parse(good.out.join("")), {
    counts: { comments: 0, functions: 1, strings: 1 },
    program: { architecture: "AMD64", entry: 4198400, name: "a.out", path: "/bins/a.out" },
    schema_version: "1.0",
    valid: true,
  });

  const badPath = path.join(dir, "bad.json");
  fs.writeFileSync(badPath, JSON.stringify({ schema_version: "2.0" }));
  const bad = captureIo();
  assert.equal(await runCli(["validate", badPath], bad), 1);
  assert.deepEqual(JSON.parse(bad.out.join("")), {
    error:
      "MALFORMED_SNAPSHOT missing sync snapshot keys: [comments, functions, generated_at_unix, metadata, program, strings]",
    valid: false,
  });
});

test("import applies renames, and --dry-run leaves the database alone", async (t) => {
  const { dir, dbPath } = workspace(t);
  const exportIo = captureIo();
  await runCli(["export", "--program", dbPath], exportIo);
  const snapshotPath = path.join(dir, "renamed.json");
  fs.writeFileSync(snapshotPath, renamedSnapshot(exportIo.out.join("")));

  const dry = captureIo();
  assert.equal(await runCli(["import", snapshotPath, "--program", dbPath, "--dry-run"], dry), 0);
  assert.equal(functionName(dbPath, 0x401000), "main");

  const real = captureIo();
  assert.equal(await runCli(["import", snapshotPath, "--program", dbPath], real), 0);
  const report: unknown = JSON.parse(real.out.join(""));
  assert.deepEqual(readProperty(report, "applied"), {
    applied_comments: 0,
    renamed_functions: 1,
  });
  assert.equal(functionName(dbPath, 0x401000), "entry_main");
});

test("serve without a program binds the placeholder and shuts down cleanly", async (t) => {
  t.mock.method(console, "warn", () => undefined);
  const io = captureIo({ SESSION_MCP_PORT: "0" });

  assert.equal(await runCli(["serve"], io), 0);

  assert.equal(io.err[0], "[cli] no --program given; serving the placeholder development program\n");
  assert.match(io.err[1] ?? "", /^\[cli\] serving MCP at http:\/\/127\.0\.0\.1:\d+\/mcp\n$/);
});
