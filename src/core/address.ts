/**
 * Base-chain address utilities
 * Validation, checksum encoding (EIP-55)
 */

import type { Address } from './types.js';
import { keccak256 } from './hash.js';
import { isHex } from './hex.js';

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as Address;

/**
 * Check if a string is a 20-byte hex address (checksum not enforced)
 */
export function isAddress(value: unknown): value is Address {
  if (typeof value !== 'string') return false;
  if (value.length !== 42) return false;
  return isHex(value);
}

export function assertAddress(value: unknown, name = 'address'): asserts value is Address {
  if (!isAddress(value)) {
    throw new Error(`${name} must be 0x followed by 40 hex characters, got: ${String(value)}`);
  }
}

/**
 * Convert an address to checksum format (EIP-55)
 */
export function toChecksumAddress(address: string): Address {
  assertAddress(address);

  const addr = address.slice(2).toLowerCase();
  const hash = keccak256(new TextEncoder().encode(addr)).slice(2);

  let checksummed = '0x';
  for (let i = 0; i < 40; i++) {
    const char = addr.charAt(i);
    checksummed += parseInt(hash.charAt(i), 16) >= 8 ? char.toUpperCase() : char;
  }

  return checksummed as Address;
}

/**
 * Lowercase canonical form, used for cache keys and encoding
 */
export function normalizeAddress(address: string): Address {
  assertAddress(address);
  return address.toLowerCase() as Address;
}

export function addressEquals(a: string, b: string): boolean {
  if (!isAddress(a) || !isAddress(b)) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Extract an address from a 32-byte ABI word
 */
export function extractAddress(word: string): Address {
  if (!isHex(word) || word.length !== 66) {
    throw new Error(`Invalid address word: ${word}`);
  }
  const leading = word.slice(2, 26);
  if (!/^0*$/.test(leading)) {
    throw new Error(`Invalid address word (non-zero leading bytes): ${word}`);
  }
  return `0x${word.slice(26).toLowerCase()}` as Address;
}
