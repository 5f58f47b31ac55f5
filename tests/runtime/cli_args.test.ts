import test from "node:test";
import assert from "node:assert/strict";
import { parseCliArgs } from "../../runtime/cli/cli.args";

test("no arguments asks for help", () => {
  assert.deepEqual(parseCliArgs([]), { command: "help" });
  assert.deepEqual(parseCliArgs(["--"]), { command: "help" });
});

test("serve reads its optional flags", () => {
  assert.deepEqual(
    parseCliArgs(["serve", "--transport", "stdio", "--port", "9000", "--program", "a.db"]),
    {
      command: "serve",
      transport: "stdio",
      host: undefined,
      port: "9000",
      program: "a.db",
    }
  );
});

test("validate, export and import read their operands", () => {
  assert.deepEqual(parseCliArgs(["validate", "snap.json"]), {
    command: "validate",
    snapshotPath: "snap.json",
  });
  assert.deepEqual(parseCliArgs(["export", "--program", "a.db", "--out", "snap.json"]), {
    command: "export",
    program: "a.db",
    out: "snap.json",
  });
  assert.deepEqual(parseCliArgs(["import", "--dry-run", "snap.json", "--program", "a.db"]), {
    command: "import",
    snapshotPath: "snap.json",
    program: "a.db",
    dryRun: true,
  });
});

test("missing operands and values are configuration errors", () => {
  assert.throws(() => parseCliArgs(["validate"]), {
    message: "CONFIGURATION_ERROR missing <snapshot.json>",
  });
  assert.throws(() => parseCliArgs(["export"]), {
    message: "CONFIGURATION_ERROR --program is required",
  });
  assert.throws(() => parseCliArgs(["serve", "--port"]), {
    message: "CONFIGURATION_ERROR --port requires a value",
  });
  assert.throws(() => parseCliArgs(["serve", "--host", "--port", "1"]), {
    message: "CONFIGURATION_ERROR --host requires a value",
  });
});

test("unknown commands and options are rejected", () => {
  assert.throws(() => parseCliArgs(["deploy"]), {
    message:
      'CONFIGURATION_ERROR unknown command "deploy". expected one of: serve, validate, export, import, help',
  });
  assert.throws(() => parseCliArgs(["serve", "--verbose"]), {
    message: "CONFIGURATION_ERROR unknown option --verbose",
  });
});
