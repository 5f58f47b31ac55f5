import fs from "node:fs";
import path from "node:path";
import { isJsonObject, isPlainObject, type JsonObject } from "../core/_shared/json";
import { MalformedSnapshotError, SnapshotParseError } from "../core/errors/errors";
import { stableStringify } from "../session/stable_stringify";
import {
  REQUIRED_SNAPSHOT_KEYS,
  SCHEMA_VERSION,
  type SyncProgram,
  type SyncSnapshot,
} from "./sync.types";

const ARRAY_FIELDS = ["functions", "strings", "comments"] as const;
const PROGRAM_STRING_FIELDS = ["name", "path", "architecture"] as const;

function readProgram(raw: Record<string, unknown>): SyncProgram {
  const fields: Record<(typeof PROGRAM_STRING_FIELDS)[number], string | null> = {
    name: null,
    path: null,
    architecture: null,
  };
  for (const field of PROGRAM_STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== "string") {
      throw new MalformedSnapshotError(`program.${field} must be a string or null`);
    }
    fields[field] = value;
  }

  const entry = raw.entry;
  if (entry !== undefined && entry !== null && !Number.isInteger(entry)) {
    throw new MalformedSnapshotError("program.entry must be an integer or null");
  }

  return {
    name: fields.name,
    path: fields.path,
    architecture: fields.architecture,
    entry: typeof entry === "number" ? entry : null,
  };
}

function readEntries(raw: readonly unknown[], field: string): JsonObject[] {
  return raw.map((entry, index) => {
    if (!isJsonObject(entry)) {
      throw new MalformedSnapshotError(`${field}[${index}] must be an object`);
    }
    return entry;
  });
}

/**
 * Checks run in a fixed order so the first reported defect is stable:
 * missing keys, version, container kinds, timestamp, then entry shapes.
 */
export function validateSnapshotRecord(data: unknown): SyncSnapshot {
  if (!isPlainObject(data)) {
    throw new MalformedSnapshotError("snapshot must be a JSON object");
  }

  const missing = REQUIRED_SNAPSHOT_KEYS.filter((key) => !(key in data)).sort();
  if (missing.length > 0) {
    throw new MalformedSnapshotError(`missing sync snapshot keys: [${missing.join(", ")}]`);
  }

  const schemaVersion = data.schema_version;
  if (schemaVersion !== SCHEMA_VERSION) {
    throw new MalformedSnapshotError(
      `unsupported schema_version=${JSON.stringify(schemaVersion)}; expected ${JSON.stringify(SCHEMA_VERSION)}`
    );
  }

  const program = data.program;
  if (!isPlainObject(program)) {
    throw new MalformedSnapshotError("program must be an object");
  }
  const arrays: Record<(typeof ARRAY_FIELDS)[number], readonly unknown[]> = {
    functions: [],
    strings: [],
    comments: [],
  };
  for (const field of ARRAY_FIELDS) {
    const value: unknown = data[field];
    if (!Array.isArray(value)) {
      throw new MalformedSnapshotError(`${field} must be an array`);
    }
    arrays[field] = value;
  }
  const metadata = data.metadata;
  if (!isPlainObject(metadata)) {
    throw new MalformedSnapshotError("metadata must be an object");
  }
  if (!isJsonObject(metadata)) {
    throw new MalformedSnapshotError("metadata must only hold JSON values");
  }

  const generatedAt = data.generated_at_unix;
  if (typeof generatedAt !== "number" || !Number.isInteger(generatedAt)) {
    throw new MalformedSnapshotError("generated_at_unix must be an integer");
  }

  return {
    schema_version: SCHEMA_VERSION,
    program: readProgram(program),
    generated_at_unix: generatedAt,
    functions: readEntries(arrays.functions, "functions"),
    strings: readEntries(arrays.strings, "strings"),
    comments: readEntries(arrays.comments, "comments"),
    metadata,
  };
}

export function encodeSnapshot(snapshot: SyncSnapshot): string {
  return stableStringify(snapshot, { indent: 2 });
}

export function decodeSnapshot(payload: string): SyncSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new SnapshotParseError(
      `snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return validateSnapshotRecord(parsed);
}

export function loadSnapshotFile(filePath: string): SyncSnapshot {
  return decodeSnapshot(fs.readFileSync(filePath, "utf8"));
}

export function saveSnapshotFile(filePath: string, snapshot: SyncSnapshot): void {
  const targetPath = path.resolve(filePath);
  const tmpPath = `${targetPath}.tmp-${process.pid}`;
  fs.mkdirSync(path.dirname(targetPath), { recursive: true });
  fs.writeFileSync(tmpPath, `${encodeSnapshot(snapshot)}\n`, "utf8");
  fs.renameSync(tmpPath, targetPath);
}
