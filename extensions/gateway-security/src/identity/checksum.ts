/**
 * Mixed-case checksum encoding for 20-byte addresses (EIP-55).
 */

import { keccak256, stringToBytes, type Hex } from "viem";
import { AddressFormatError, ChecksumMismatchError } from "../errors.js";

export const ADDRESS_PREFIX = "0x";

const ADDRESS_BODY_PATTERN = /^[0-9a-fA-F]{40}$/;

function stripPrefix(address: string): string {
  return address.startsWith(ADDRESS_PREFIX) ? address.slice(ADDRESS_PREFIX.length) : address;
}

/**
 * Encode an address in checksum form.
 * Accepts the address with or without `0x`; the result always carries it.
 */
export function computeChecksum(address: string): Hex {
  const lowered = stripPrefix(address.toLowerCase());
  const hash = keccak256(stringToBytes(lowered), "bytes");

  let result = "";
  for (let i = 0; i < lowered.length; i++) {
    const c = lowered[i];
    if (c >= "0" && c <= "9") {
      result += c;
      continue;
    }
    // High nibble of hash[i / 2] for even positions, low nibble for odd ones
    const bit = 1 << (7 - 4 * (i % 2));
    result += (hash[i >> 1] & bit) !== 0 ? c.toUpperCase() : c;
  }

  return `${ADDRESS_PREFIX}${result}`;
}

/** Case-sensitive: a lower-case or unprefixed address is not valid. */
export function isValidChecksum(address: string): boolean {
  return address === computeChecksum(address);
}

export function parseAddress(address: string): Hex {
  if (!address.startsWith(ADDRESS_PREFIX)) {
    throw new AddressFormatError("address must be prefixed with 0x");
  }
  const body = address.slice(ADDRESS_PREFIX.length);
  if (!ADDRESS_BODY_PATTERN.test(body)) {
    throw new AddressFormatError("address must be 40 hex characters after the 0x prefix");
  }
  return `${ADDRESS_PREFIX}${body}`;
}

export function parseValidAddress(address: string): Hex {
  const parsed = parseAddress(address);
  if (!isValidChecksum(parsed)) {
    throw new ChecksumMismatchError();
  }
  return parsed;
}
