import type { JsonObject } from "../core/_shared/json";
import type { ProgramDescriptor } from "../session/session.types";

export const SCHEMA_VERSION = "1.0";

export const REQUIRED_SNAPSHOT_KEYS = Object.freeze([
  "schema_version",
  "program",
  "generated_at_unix",
  "functions",
  "strings",
  "comments",
  "metadata",
] as const);

export type SyncProgram = ProgramDescriptor;

export interface FunctionRow extends JsonObject {
  readonly address: string;
  readonly name: string | null;
  readonly size: number | null;
}

export interface StringRow extends JsonObject {
  readonly address: string | null;
  readonly value: string;
}

export interface CommentRow extends JsonObject {
  readonly address: string;
  readonly text: string;
}

/**
 * Point-in-time export of a program's knowledge base. Entries read back from
 * a hand-edited file are only known to be objects; the import side narrows
 * each field before use.
 */
export interface SyncSnapshot {
  readonly schema_version: string;
  readonly program: SyncProgram;
  readonly generated_at_unix: number;
  readonly functions: readonly JsonObject[];
  readonly strings: readonly JsonObject[];
  readonly comments: readonly JsonObject[];
  readonly metadata: JsonObject;
}
