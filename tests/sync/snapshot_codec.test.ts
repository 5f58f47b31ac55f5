/**
 * Intent: snapshot validation rejects every malformed shape with a stable message,
 * and encoding is deterministic.
 * Scope: validateSnapshotRecord, decode/encode, file save/load.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MalformedSnapshotError, SnapshotParseError } from "../../src/core/errors/errors";
import {
  decodeSnapshot,
  encodeSnapshot,
  loadSnapshotFile,
  saveSnapshotFile,
  validateSnapshotRecord,
} from "../../src/sync/snapshot.codec";
import { REQUIRED_SNAPSHOT_KEYS } from "../../src/sync/sync.types";

function validRecord(): Record<string, unknown> {
  return {
    schema_version: "1.0",
    program: { name: "a.out", path: "/bins/a.out", architecture: "AMD64", entry: 4198400 },
    generated_at_unix: 1700000000,
    functions: [{ address: "0x401000", name: "main", size: 32 }],
    strings: [{ address: "0x402000", value: "hello" }],
    comments: [],
    metadata: { tool: "kb-session-mcp" },
  };
}

function malformedMessage(data: unknown): string {
  try {
    validateSnapshotRecord(data);
  } catch (error) {
    assert.ok(error instanceof MalformedSnapshotError);
    return error.message;
  }
  assert.fail("expected validation to fail");
}

test("a valid record decodes with its program normalized", () => {
  const snapshot = decodeSnapshot(JSON.stringify(validRecord()));

  assert.equal(snapshot.schema_version, "1.0");
  assert.deepEqual(snapshot.program, {
    name: "a.out",
    path: "/bins/a.out",
    architecture: "AMD64",
    entry: 4198400,
  });
  assert.deepEqual(snapshot.functions, [{ address: "0x401000", name: "main", size: 32 }]);
  assert.equal(snapshot.generated_at_unix, 1700000000);
});

test("missing program fields default to null", () => {
  const snapshot = validateSnapshotRecord({ ...validRecord(), program: {} });

  assert.deepEqual(snapshot.program, { name: null, path: null, architecture: null, entry: null });
});

test("text that is not JSON fails with SnapshotParseError", () => {
  assert.throws(() => decodeSnapshot("{not json"), SnapshotParseError);
  assert.throws(() => decodeSnapshot("{not json"), /SNAPSHOT_NOT_JSON snapshot is not valid JSON: /);
});

test("non-object JSON is malformed", () => {
  assert.equal(malformedMessage([]), "MALFORMED_SNAPSHOT snapshot must be a JSON object");
  assert.equal(malformedMessage("1.0"), "MALFORMED_SNAPSHOT snapshot must be a JSON object");
});

test("each required key is reported when it is missing", () => {
  for (const key of REQUIRED_SNAPSHOT_KEYS) {
    const record = validRecord();
    delete record[key];
    assert.equal(
      malformedMessage(record),
      `MALFORMED_SNAPSHOT missing sync snapshot keys: [${key}]`
    );
  }
});

test("several missing keys are listed in sorted order", () => {
  assert.equal(
    malformedMessage({ schema_version: "1.0", program: {} }),
    "MALFORMED_SNAPSHOT missing sync snapshot keys: [comments, functions, generated_at_unix, metadata, strings]"
  );
});

test("an unknown schema version is rejected", () => {
  assert.equal(
    malformedMessage({ ...validRecord(), schema_version: "2.0" }),
    'MALFORMED_SNAPSHOT unsupported schema_version="2.0"; expected "1.0"'
  );
  assert.equal(
    malformedMessage({ ...validRecord(), schema_version: 1 }),
    'MALFORMED_SNAPSHOT unsupported schema_version=1; expected "1.0"'
  );
});

test("container kinds are checked", () => {
  assert.equal(
    malformedMessage({ ...validRecord(), program: [] }),
    "MALFORMED_SNAPSHOT program must be an object"
  );
  assert.equal(
    malformedMessage({ ...validRecord(), strings: {} }),
    "MALFORMED_SNAPSHOT strings must be an array"
  );
  assert.equal(
    malformedMessage({ ...validRecord(), metadata: "none" }),
    "MALFORMED_SNAPSHOT metadata must be an object"
  );
});

test("timestamp, program fields and entries are checked", () => {
  assert.equal(
    malformedMessage({ ...validRecord(), generated_at_unix: 1.5 }),
    "MALFORMED_SNAPSHOT generated_at_unix must be an integer"
  );
  assert.equal(
    malformedMessage({ ...validRecord(), program: { name: 7 } }),
    "MALFORMED_SNAPSHOT program.name must be a string or null"
  );
  assert.equal(
    malformedMessage({ ...validRecord(), program: { entry: "0x10" } }),
    "MALFORMED_SNAPSHOT program.entry must be an integer or null"
  );
  assert.equal(
    malformedMessage({ ...validRecord(), functions: [{}, 3] }),
    "MALFORMED_SNAPSHOT functions[1] must be an object"
  );
});

test("encoding is sorted, indented and idempotent", () => {
  const encoded = encodeSnapshot(decodeSnapshot(JSON.stringify(validRecord())));

  assert.ok(encoded.startsWith('{\n  "comments": [],\n  "functions": ['));
  assert.equal(encodeSnapshot(decodeSnapshot(encoded)), encoded);
});

test("metadata round-trips with any JSON key, __proto__ included", () => {
  const metadata: unknown = JSON.parse('{"k":1,"__proto__":{"owner":"test-owner"}}');
  const snapshot = validateSnapshotRecord({ ...validRecord(), metadata });

  const decoded = decodeSnapshot(encodeSnapshot(snapshot));

  assert.deepEqual(decoded, snapshot);
  assert.deepEqual(Object.keys(decoded.metadata), ["__proto__", "k"]);
  assert.deepEqual(decoded.metadata["__proto__"], { owner: "test-owner" });
});

test("saved snapshots load back with a trailing newline on disk", (t) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-codec-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  const filePath = path.join(dir, "nested", "snapshot.json");
  const snapshot = validateSnapshotRecord(validRecord());

  saveSnapshotFile(filePath, snapshot);

  const raw = fs.readFileSync(filePath, "utf8");
  assert.equal(raw, `${encodeSnapshot(snapshot)}\n`);
  assert.deepEqual(loadSnapshotFile(filePath), snapshot);
  assert.deepEqual(fs.readdirSync(path.dirname(filePath)), ["snapshot.json"]);
});
