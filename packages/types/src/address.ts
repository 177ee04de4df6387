/**
 * Address primitives.
 *
 * Vault, token, strategy and user identities are EVM-style hex
 * addresses. Checksumming and validation are delegated to viem.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import type { Address } from "viem";

export type { Address };

/** The all-zero address, never a valid receiver or owner. */
export const ZERO_ADDRESS: Address = zeroAddress;

/**
 * True when `value` is a well-formed address other than the zero address.
 */
export function isNonZeroAddress(value: unknown): value is Address {
  return (
    typeof value === "string" &&
    isAddress(value, { strict: false }) &&
    value.toLowerCase() !== ZERO_ADDRESS
  );
}

/**
 * Normalize an address to its checksummed form so map keys compare equal
 * regardless of input casing.
 */
export function normalizeAddress(value: Address): Address {
  return getAddress(value);
}

/**
 * Case-insensitive address equality.
 */
export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
