/**
 * Intent: importing a snapshot renames what differs, writes every addressable comment,
 * and records per-entry failures without stopping.
 * Scope: applySnapshot against in-memory programs bound to a SessionAdapter.
 */
import test from "node:test";
import assert from "node:assert/strict";
import type { FunctionTable, HostFunction } from "../../src/host/host.types";
import { createInMemoryProgram } from "../../src/host/in_memory.program";
import { SessionAdapter } from "../../src/session/session.adapter";
import { decodeSnapshot, encodeSnapshot, validateSnapshotRecord } from "../../src/sync/snapshot.codec";
import { buildSnapshot } from "../../src/sync/snapshot.export";
import { applySnapshot } from "../../src/sync/snapshot.import";

function snapshotOf(partial: { functions?: unknown[]; comments?: unknown[] }) {
  return validateSnapshotRecord({
    schema_version: "1.0",
    program: { name: "a.out", path: null, architecture: null, entry: null },
    generated_at_unix: 0,
    functions: partial.functions ?? [],
    strings: [],
    comments: partial.comments ?? [],
    metadata: {},
  });
}

function boundSession() {
  const program = createInMemoryProgram({
    functions: [{ address: 0x401000, name: "main", size: 32 }],
  });
  const session = new SessionAdapter();
  session.setProject(program);
  return { session, program };
}

test("re-importing an export applies nothing", () => {
  const program = createInMemoryProgram({
    functions: [{ address: 0x401000, name: "main", size: 32 }],
    strings: [[0x402000, "hello"]],
  });
  const session = new SessionAdapter();
  session.setProject(program);
  const exported = encodeSnapshot(
    buildSnapshot(program, session.getProgramDescriptor(), { now: () => new Date(0) })
  );

  const result = applySnapshot(decodeSnapshot(exported), session, true);

  assert.deepEqual(result.counts, { functions: 1, strings: 1, comments: 0 });
  assert.deepEqual(result.applied, { renamed_functions: 0, applied_comments: 0 });
  assert.deepEqual(result.apply_errors, []);
  assert.equal(program.kb?.functions?.get(0x401000)?.name, "main");
});

test("renames apply and unaddressable entries are skipped silently", () => {
  const { session, program } = boundSession();
  const snapshot = snapshotOf({
    functions: [
      { address: "0x401000", name: "entry_main" },
      { address: "zzz", name: "bad_address" },
      { address: "0x999", name: "not_a_function" },
      { address: "0x401000", name: "" },
      { name: "no_address" },
    ],
  });

  const result = applySnapshot(snapshot, session, true);

  assert.deepEqual(result.applied, { renamed_functions: 1, applied_comments: 0 });
  assert.deepEqual(result.apply_errors, []);
  assert.equal(program.kb?.functions?.get(0x401000)?.name, "entry_main");
});

test("comments are written on every apply, even when the text already matches", () => {
  const { session, program } = boundSession();
  const snapshot = snapshotOf({
    comments: [
      { address: "0x401000", text: "entry point" },
      { address: "0x401010", text: 5 },
    ],
  });

  const first = applySnapshot(snapshot, session, true);
  const second = applySnapshot(snapshot, session, true);

  assert.equal(first.applied.applied_comments, 1);
  assert.equal(second.applied.applied_comments, 1);
  assert.equal(program.kb?.comments?.get(0x401000), "entry point");
});

test("apply_changes=false validates and counts only", () => {
  const { session, program } = boundSession();
  const snapshot = snapshotOf({ functions: [{ address: "0x401000", name: "renamed" }] });

  const result = applySnapshot(snapshot, session, false);

  assert.equal(result.apply_changes, false);
  assert.deepEqual(result.applied, { renamed_functions: 0, applied_comments: 0 });
  assert.equal(program.kb?.functions?.get(0x401000)?.name, "main");
});

test("a failing rename is recorded and later entries still apply", () => {
  const locked: HostFunction = {
    get name(): string {
      return "locked";
    },
    set name(_value: string | null | undefined) {
      throw new Error("read-only");
    },
  };
  const open: HostFunction = { name: "open" };
  const table = new Map<number, HostFunction>([
    [0x10, locked],
    [0x20, open],
  ]);
  const functions: FunctionTable = {
    has: (address) => table.has(address),
    get: (address) => table.get(address),
    entries: () => table.entries(),
  };
  const session = new SessionAdapter();
  session.setProject({ kb: { functions } });

  const result = applySnapshot(
    snapshotOf({
      functions: [
        { address: "0x10", name: "first" },
        { address: "0x20", name: "second" },
      ],
    }),
    session,
    true
  );

  assert.deepEqual(result.apply_errors, ["rename 0x10: read-only"]);
  assert.equal(result.applied.renamed_functions, 1);
  assert.equal(open.name, "second");
});

test("a missing program is recorded as an apply error", () => {
  const result = applySnapshot(snapshotOf({}), new SessionAdapter(), true);

  assert.deepEqual(result.apply_errors, [
    "NO_ACTIVE_PROGRAM no active program is bound to the session",
  ]);
  assert.deepEqual(result.program, { name: "a.out", path: null, architecture: null, entry: null });
});
