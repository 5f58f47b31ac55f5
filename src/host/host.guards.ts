import { hasProperty, isCallable, readPath, readProperty } from "../core/_shared/probe";
import type {
  AnalysisEngine,
  CommentTable,
  FunctionTable,
  HostProgram,
  StringTable,
  XrefIndex,
} from "./host.types";

function hasMethods(value: unknown, names: readonly string[]): boolean {
  return names.every((name) => isCallable(readProperty(value, name)));
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}

/** A candidate is a program when it carries a loader or a knowledge base. */
export function isHostProgram(value: unknown): value is HostProgram {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return hasProperty(value, "loader") || hasProperty(value, "kb");
}

export function isFunctionTable(value: unknown): value is FunctionTable {
  return hasMethods(value, ["has", "get", "entries"]);
}

export function isCommentTable(value: unknown): value is CommentTable {
  return hasMethods(value, ["get", "set", "entries"]);
}

export function isStringTable(value: unknown): value is StringTable {
  return isIterable(value);
}

export function isXrefIndex(value: unknown): value is XrefIndex {
  return hasMethods(value, ["getXrefsByDst"]);
}

export function functionTableOf(program: HostProgram): FunctionTable | null {
  const table: unknown = readPath(program, ["kb", "functions"]);
  return isFunctionTable(table) ? table : null;
}

export function commentTableOf(program: HostProgram): CommentTable | null {
  const table: unknown = readPath(program, ["kb", "comments"]);
  return isCommentTable(table) ? table : null;
}

export function stringTableOf(program: HostProgram): StringTable | null {
  const table: unknown = readPath(program, ["kb", "strings"]);
  return isStringTable(table) ? table : null;
}

export function xrefIndexOf(program: HostProgram): XrefIndex | null {
  const index: unknown = readPath(program, ["kb", "xrefs"]);
  return isXrefIndex(index) ? index : null;
}

export function analysisEngineOf(program: HostProgram): AnalysisEngine | null {
  const engine = program.analyses;
  return typeof engine === "object" && engine !== null ? engine : null;
}
