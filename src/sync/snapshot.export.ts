import type { JsonObject } from "../core/_shared/json";
import { readProperty, toOptionalInteger } from "../core/_shared/probe";
import { formatAddress } from "../host/address";
import { commentTableOf, functionTableOf, stringTableOf } from "../host/host.guards";
import type { Address, HostFunction, HostProgram, StringTableItem } from "../host/host.types";
import type { ProgramDescriptor } from "../session/session.types";
import {
  SCHEMA_VERSION,
  type CommentRow,
  type FunctionRow,
  type StringRow,
  type SyncSnapshot,
} from "./sync.types";

function isPair(item: unknown): item is readonly [unknown, unknown] {
  return Array.isArray(item) && item.length === 2;
}

function byAddress<T>(a: readonly [Address, T], b: readonly [Address, T]): number {
  return a[0] - b[0];
}

export function functionRows(program: HostProgram): FunctionRow[] {
  const functions = functionTableOf(program);
  if (functions === null) {
    return [];
  }
  return [...functions.entries()]
    .sort(byAddress<HostFunction>)
    .map(([address, func]) => ({
      address: formatAddress(address),
      name: typeof func.name === "string" ? func.name : null,
      size: toOptionalInteger(func.size),
    }));
}

/**
 * One string row per table item. Items are `[address, text]` pairs, entry
 * objects carrying `addr`/`string`, or bare strings with no address.
 */
export function toStringRow(item: StringTableItem): StringRow {
  if (typeof item === "string") {
    return { address: null, value: item };
  }
  if (isPair(item)) {
    const [address, value] = item;
    return {
      address: typeof address === "number" ? formatAddress(address) : null,
      value: String(value),
    };
  }
  const address = readProperty(item, "addr");
  const text = readProperty(item, "string");
  return {
    address: typeof address === "number" ? formatAddress(address) : null,
    value: typeof text === "string" ? text : "",
  };
}

function pairAddress(item: StringTableItem): number {
  if (isPair(item)) {
    const [address] = item;
    return typeof address === "number" ? address : -1;
  }
  return -1;
}

export function stringItems(program: HostProgram): StringTableItem[] {
  const strings = stringTableOf(program);
  if (strings === null) {
    return [];
  }
  const items = [...strings];
  const first = items[0];
  // Address-keyed tables come back in address order; plain iterables keep host order.
  if (first !== undefined && isPair(first)) {
    items.sort((a, b) => pairAddress(a) - pairAddress(b));
  }
  return items;
}

export function stringRows(program: HostProgram): StringRow[] {
  return stringItems(program).map((item) => toStringRow(item));
}

export function commentRows(program: HostProgram): CommentRow[] {
  const comments = commentTableOf(program);
  if (comments === null) {
    return [];
  }
  return [...comments.entries()]
    .filter((entry): entry is readonly [Address, string] => typeof entry[1] === "string")
    .sort(byAddress<string>)
    .map(([address, text]) => ({ address: formatAddress(address), text }));
}

export interface BuildSnapshotOptions {
  readonly now?: () => Date;
  readonly metadata?: JsonObject;
}

export function buildSnapshot(
  program: HostProgram,
  descriptor: ProgramDescriptor,
  options: BuildSnapshotOptions = {}
): SyncSnapshot {
  const now = options.now ?? (() => new Date());
  return {
    schema_version: SCHEMA_VERSION,
    program: {
      name: descriptor.name,
      path: descriptor.path,
      architecture: descriptor.architecture,
      entry: descriptor.entry,
    },
    generated_at_unix: Math.floor(now().getTime() / 1000),
    functions: functionRows(program),
    strings: stringRows(program),
    comments: commentRows(program),
    metadata: options.metadata ?? {},
  };
}
