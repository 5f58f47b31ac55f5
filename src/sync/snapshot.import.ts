import type { JsonObject } from "../core/_shared/json";
import { parseHexAddress } from "../host/address";
import { commentTableOf, functionTableOf } from "../host/host.guards";
import type { HostProgram } from "../host/host.types";
import type { SessionAdapter } from "../session/session.adapter";
import type { ProgramDescriptor } from "../session/session.types";
import type { SyncSnapshot } from "./sync.types";

export interface ImportCounts {
  readonly functions: number;
  readonly strings: number;
  readonly comments: number;
}

export interface AppliedChanges {
  renamed_functions: number;
  applied_comments: number;
}

export interface ImportResult {
  readonly schema_version: string;
  readonly program: ProgramDescriptor;
  readonly counts: ImportCounts;
  readonly applied: AppliedChanges;
  readonly apply_changes: boolean;
  readonly apply_errors: readonly string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface AddressedEntry {
  readonly addressText: string;
  readonly address: number;
}

/**
 * Address of an entry, or null when the entry is not eligible. Entries with a
 * non-hex address are skipped without an error.
 */
function addressOf(entry: JsonObject): AddressedEntry | null {
  const addressText = entry.address;
  if (typeof addressText !== "string" || addressText === "") {
    return null;
  }
  const address = parseHexAddress(addressText);
  return address === null ? null : { addressText, address };
}

function applyRenames(
  snapshot: SyncSnapshot,
  program: HostProgram,
  applied: AppliedChanges,
  errors: string[]
): void {
  const functions = functionTableOf(program);
  if (functions === null) {
    return;
  }
  for (const entry of snapshot.functions) {
    const newName = entry.name;
    if (typeof newName !== "string" || newName === "") {
      continue;
    }
    const target = addressOf(entry);
    if (target === null || !functions.has(target.address)) {
      continue;
    }
    const func = functions.get(target.address);
    if (func === undefined || func.name === newName) {
      continue;
    }
    try {
      func.name = newName;
      applied.renamed_functions += 1;
    } catch (error) {
      errors.push(`rename ${target.addressText}: ${errorMessage(error)}`);
    }
  }
}

function applyComments(
  snapshot: SyncSnapshot,
  program: HostProgram,
  applied: AppliedChanges,
  errors: string[]
): void {
  const comments = commentTableOf(program);
  if (comments === null) {
    return;
  }
  for (const entry of snapshot.comments) {
    const text = entry.text;
    if (typeof text !== "string") {
      continue;
    }
    const target = addressOf(entry);
    if (target === null) {
      continue;
    }
    try {
      comments.set(target.address, text);
      applied.applied_comments += 1;
    } catch (error) {
      errors.push(`comment ${target.addressText}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Applies function renames and comments from a validated snapshot to the
 * bound program. Per-entry failures are collected; so is a failure to obtain
 * the program at all.
 */
export function applySnapshot(
  snapshot: SyncSnapshot,
  adapter: SessionAdapter,
  applyChanges: boolean
): ImportResult {
  const applied: AppliedChanges = { renamed_functions: 0, applied_comments: 0 };
  const applyErrors: string[] = [];

  if (applyChanges) {
    try {
      const program = adapter.requireProject();
      applyRenames(snapshot, program, applied, applyErrors);
      applyComments(snapshot, program, applied, applyErrors);
      adapter.refreshGui();
    } catch (error) {
      applyErrors.push(errorMessage(error));
    }
  }

  return {
    schema_version: snapshot.schema_version,
    program: snapshot.program,
    counts: {
      functions: snapshot.functions.length,
      strings: snapshot.strings.length,
      comments: snapshot.comments.length,
    },
    applied,
    apply_changes: applyChanges,
    apply_errors: applyErrors,
  };
}
