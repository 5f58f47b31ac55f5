function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unsupportedTypeLabel(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  if (typeof value === "number") {
    return "non-finite number";
  }
  return typeof value;
}

function assertSupported(value: unknown): void {
  if (
    value === undefined ||
    typeof value === "function" ||
    typeof value === "bigint" ||
    typeof value === "symbol" ||
    (typeof value === "number" && !Number.isFinite(value))
  ) {
    throw new Error(
      `VALIDATION_ERROR stableStringify does not support type=${unsupportedTypeLabel(value)}`
    );
  }
}

// Code-point order, independent of the runtime's collation locale.
function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function normalize(value: unknown): unknown {
  assertSupported(value);

  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }

  if (!isPlainObject(value)) {
    throw new Error("VALIDATION_ERROR stableStringify only supports plain objects");
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    throw new Error("VALIDATION_ERROR stableStringify only supports plain objects");
  }

  const out: Record<string, unknown> = {};
  const keys = Object.keys(value).sort(compareKeys);
  for (const key of keys) {
    // Plain assignment would treat "__proto__" as the prototype setter.
    Object.defineProperty(out, key, {
      value: normalize(value[key]),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return out;
}

export interface StableStringifyOptions {
  readonly indent?: number;
}

export function stableStringify(value: unknown, options: StableStringifyOptions = {}): string {
  return JSON.stringify(normalize(value), null, options.indent);
}
