import { InvalidArgumentError } from "../core/errors/errors";
import { MAX_ADDRESS, exceedsAddressRange, formatAddress, parseHexAddress } from "../host/address";
import type { Address } from "../host/host.types";
import type { ToolArguments } from "./tool.types";
import { MAX_TIMEOUT_SECONDS } from "./with_timeout";

export function requireString(args: ToolArguments, field: string): string {
  const value = args[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidArgumentError(field, "expected a non-empty string");
  }
  return value;
}

export function optionalString(args: ToolArguments, field: string): string | undefined {
  const value = args[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new InvalidArgumentError(field, "expected a string");
  }
  return value;
}

export function optionalInteger(
  args: ToolArguments,
  field: string,
  fallback: number,
  min?: number
): number {
  const value = args[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidArgumentError(field, "expected an integer");
  }
  if (min !== undefined && value < min) {
    throw new InvalidArgumentError(field, `must be >= ${min}`);
  }
  return value;
}

/** Seconds for withTimeout; zero or less disables the timer. */
export function optionalTimeoutSeconds(
  args: ToolArguments,
  field: string,
  fallback: number
): number {
  const seconds = optionalInteger(args, field, fallback);
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(field, `must be <= ${MAX_TIMEOUT_SECONDS}`);
  }
  return seconds;
}

export function optionalBoolean(args: ToolArguments, field: string, fallback: boolean): boolean {
  const value = args[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new InvalidArgumentError(field, "expected a boolean");
  }
  return value;
}

export function requireAddress(args: ToolArguments, field: string): Address {
  const text = requireString(args, field);
  const address = parseHexAddress(text);
  if (address === null) {
    throw new InvalidArgumentError(field, addressDefect(text));
  }
  return address;
}

function addressDefect(text: string): string {
  if (exceedsAddressRange(text)) {
    return `${text.trim()} exceeds the largest supported address ${formatAddress(MAX_ADDRESS)}`;
  }
  return `expected a hex address, got ${JSON.stringify(text)}`;
}

export function optionalAddressList(args: ToolArguments, field: string): Address[] {
  const value = args[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(field, "expected a list of hex addresses");
  }
  const items: readonly unknown[] = value;
  return items.map((item, index) => {
    const address = typeof item === "string" ? parseHexAddress(item) : null;
    if (address === null) {
      throw new InvalidArgumentError(`${field}[${index}]`, "expected a hex address");
    }
    return address;
  });
}
