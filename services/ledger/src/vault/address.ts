import { getAddress, isAddress } from "viem";
import { LedgerError } from "./errors.js";
import type { Address } from "./types.js";

/**
 * Normalizes an account identity to its checksummed form so the same
 * account never appears under two spellings.
 */
export function normalizeAddress(value: string, field = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new LedgerError("InvalidAddress", `Invalid ${field}`, { details: { value } });
  }
  return getAddress(value);
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
