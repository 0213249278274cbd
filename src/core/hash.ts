/**
 * Cryptographic hash functions
 * Wrapper around @noble/hashes
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { sha256 as nobleSha256 } from '@noble/hashes/sha2';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex } from './hex.js';

function toBytes(data: Hex | Uint8Array | string): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (isHex(data)) {
    return hexToBytes(data);
  }
  return new TextEncoder().encode(data);
}

/**
 * Compute keccak256 hash (L1 hashing)
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  return bytesToHex(keccak_256(toBytes(data))) as Hash;
}

/**
 * Compute SHA256 hash
 */
export function sha256(data: Hex | Uint8Array | string): Hash {
  return bytesToHex(nobleSha256(toBytes(data))) as Hash;
}

/**
 * Raw SHA256 digest bytes
 */
export function sha256Bytes(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

/**
 * Compute event topic from event signature
 * e.g., "NewPriorityRequest(address,uint64,uint8,bytes,uint256)"
 */
export function eventTopic(signature: string): Hash {
  return keccak256(signature);
}

/**
 * Hash a message according to EIP-191 personal sign
 * Prepends "\x19Ethereum Signed Message:\n" + length
 */
export function hashMessage(message: string | Uint8Array): Hash {
  const messageBytes = typeof message === 'string' ? new TextEncoder().encode(message) : message;

  const prefix = `\x19Ethereum Signed Message:\n${messageBytes.length}`;
  const prefixBytes = new TextEncoder().encode(prefix);

  const combined = new Uint8Array(prefixBytes.length + messageBytes.length);
  combined.set(prefixBytes);
  combined.set(messageBytes, prefixBytes.length);

  return keccak256(combined);
}
