import type { Address } from "./host.types";

const HEX_ADDRESS_PATTERN = /^\s*(?:0x)?([0-9a-f]+)\s*$/i;

/** Addresses are plain numbers, so anything above 2^53 - 1 is out of range. */
export const MAX_ADDRESS = Number.MAX_SAFE_INTEGER;

/** Base-16 parse with an optional `0x` prefix. Returns null on anything else. */
export function parseHexAddress(text: string): Address | null {
  const matched = HEX_ADDRESS_PATTERN.exec(text);
  if (!matched) {
    return null;
  }
  const digits = matched[1] ?? "";
  const parsed = Number.parseInt(digits, 16);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/** True for well-formed hex text whose value is above MAX_ADDRESS. */
export function exceedsAddressRange(text: string): boolean {
  return HEX_ADDRESS_PATTERN.test(text) && parseHexAddress(text) === null;
}

export function formatAddress(address: Address): string {
  return `0x${address.toString(16)}`;
}
