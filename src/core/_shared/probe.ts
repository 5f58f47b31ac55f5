/**
 * Property probing over host objects whose shape is not under our control.
 * Reads never throw: a missing owner, a missing key or a throwing getter all
 * read as `undefined`.
 */

function isProbeable(target: unknown): target is object {
  return (typeof target === "object" && target !== null) || typeof target === "function";
}

export function readProperty(target: unknown, key: string): unknown {
  if (!isProbeable(target)) {
    return undefined;
  }
  try {
    return Reflect.get(target, key);
  } catch {
    return undefined;
  }
}

export function readPath(target: unknown, keys: readonly string[]): unknown {
  let current: unknown = target;
  for (const key of keys) {
    if (current === undefined || current === null) {
      return undefined;
    }
    current = readProperty(current, key);
  }
  return current;
}

export function hasProperty(target: unknown, key: string): boolean {
  if (!isProbeable(target)) {
    return false;
  }
  try {
    return Reflect.has(target, key);
  } catch {
    return false;
  }
}

export function isCallable(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === "function";
}

export function toOptionalString(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return null;
}

export function toOptionalInteger(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}
