import { getAddress, isHexString } from "ethers";

const EVM_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const DECIMAL_RE = /^(0|[1-9][0-9]*)$/;

/** Largest value of a Solidity uint256. */
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Returns true if `value` is a valid EVM address (0x followed by 40 hex chars).
 */
export function isEvmAddress(value: string): boolean {
  return EVM_ADDRESS_RE.test(value);
}

/**
 * Checksummed form of an address, or null when it is not one.
 * Identities are always compared in this form.
 */
export function normalizeAddress(value: string): string | null {
  if (!isEvmAddress(value)) {
    return null;
  }
  try {
    return getAddress(value);
  } catch {
    // mixed-case input with a bad checksum
    return null;
  }
}

/** True for a 0x-prefixed 32-byte hex string. */
export function isBytes32(value: string): boolean {
  return isHexString(value, 32);
}

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

/**
 * Parse a uint256 from a bigint, a safe non-negative integer, or a decimal
 * string. Returns null for anything else.
 */
export function parseUint256(value: unknown): bigint | null {
  let parsed: bigint;
  if (typeof value === "bigint") {
    parsed = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) return null;
    parsed = BigInt(value);
  } else if (typeof value === "string" && DECIMAL_RE.test(value)) {
    parsed = BigInt(value);
  } else {
    return null;
  }
  return isUint256(parsed) ? parsed : null;
}
