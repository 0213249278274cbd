/**
 * Hex string and byte utilities
 */

import type { Hash, Hex } from './types.js';

const hexChars = '0123456789abcdef';

/**
 * Check if a value is a valid hex string
 */
export function isHex(value: unknown): value is Hex {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  return /^[0-9a-fA-F]*$/.test(value.slice(2));
}

/**
 * Check if a value is a 32-byte hex string
 */
export function isHash(value: unknown): value is Hash {
  return isHex(value) && value.length === 66;
}

/**
 * Assert that a value is a valid hex string
 */
export function assertHex(value: unknown, name = 'value'): asserts value is Hex {
  if (!isHex(value)) {
    throw new Error(`${name} must be a valid hex string starting with 0x, got: ${String(value)}`);
  }
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '0x';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return hex as Hex;
}

/**
 * Convert hex string to bytes
 * Accepts both uppercase and lowercase hex characters
 */
export function hexToBytes(hex: Hex): Uint8Array {
  assertHex(hex);
  const hexStr = hex.slice(2);
  const padded = hexStr.length % 2 === 0 ? hexStr : '0' + hexStr;
  const bytes = new Uint8Array(padded.length / 2);

  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/**
 * Convert a number or bigint to hex string
 */
export function numberToHex(value: number | bigint): Hex {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Cannot convert ${value} to hex: must be a non-negative integer`);
    }
    return `0x${value.toString(16)}`;
  }
  if (value < 0n) {
    throw new Error(`Cannot convert negative bigint to hex: ${value}`);
  }
  return `0x${value.toString(16)}`;
}

/**
 * Convert hex string to number
 */
export function hexToNumber(hex: Hex): number {
  assertHex(hex);
  if (hex === '0x') return 0;
  const value = parseInt(hex.slice(2), 16);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`Hex value ${hex} is too large for a safe integer, use hexToBigInt instead`);
  }
  return value;
}

/**
 * Convert hex string to bigint
 */
export function hexToBigInt(hex: Hex): bigint {
  assertHex(hex);
  if (hex === '0x') return 0n;
  return BigInt(hex);
}

/**
 * Pad hex string to a specific byte length (left-padded with zeros)
 */
export function padHex(hex: Hex, byteLength: number): Hex {
  assertHex(hex);
  const hexStr = hex.slice(2);
  const targetLength = byteLength * 2;
  if (hexStr.length > targetLength) {
    throw new Error(`Hex string ${hex} exceeds ${byteLength} bytes`);
  }
  return `0x${hexStr.padStart(targetLength, '0')}`;
}

/**
 * Concatenate multiple hex strings
 */
export function concatHex(...hexStrings: Hex[]): Hex {
  let result = '0x';
  for (const hex of hexStrings) {
    assertHex(hex);
    result += hex.slice(2);
  }
  return result as Hex;
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Big-endian encoding of an unsigned integer into a fixed number of bytes
 */
export function uintToBytes(value: number | bigint, byteLength: number): Uint8Array {
  let v = BigInt(value);
  if (v < 0n) {
    throw new Error(`Cannot encode negative value ${v}`);
  }
  if (v >> BigInt(byteLength * 8) !== 0n) {
    throw new Error(`Value ${v} does not fit into ${byteLength} bytes`);
  }
  const out = new Uint8Array(byteLength);
  for (let i = byteLength - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/**
 * Big-endian decoding of an unsigned integer
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let v = 0n;
  for (const byte of bytes) {
    v = (v << 8n) | BigInt(byte);
  }
  return v;
}

/**
 * Convert string to hex (UTF-8 encoding)
 */
export function stringToHex(str: string): Hex {
  return bytesToHex(new TextEncoder().encode(str));
}
