/**
 * Address normalization.
 *
 * Asset identifiers and identities are compared in checksum form, so
 * "0xabc..." and "0xABC..." name the same ledger. The zero address is
 * never a valid asset or controller.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import type { Address } from "@vestlock/types";

/**
 * Normalize a string to a checksummed, non-zero address.
 *
 * @returns undefined when the value is not a usable address.
 */
export function normalizeAddress(value: string): Address | undefined {
  if (!isAddress(value, { strict: false })) {
    return undefined;
  }
  const checksummed = getAddress(value);
  return checksummed === zeroAddress ? undefined : checksummed;
}

export function sameAddress(a: string, b: string): boolean {
  const left = normalizeAddress(a);
  return left !== undefined && left === normalizeAddress(b);
}
