/**
 * Narrowing helpers for JSON-RPC results
 * Responses are untyped JSON; these check each field before it reaches typed code.
 */

import type { Address, Hash, Hex } from '../core/types.js';
import { isAddress } from '../core/address.js';
import { isHash, isHex } from '../core/hex.js';
import { RollupError } from '../wallet/errors.js';

export type JsonRecord = Record<string, unknown>;

export function invalidResponse(what: string, value: unknown): RollupError {
  return new RollupError({
    code: 'INVALID_RESPONSE',
    message: `Unexpected ${what} in RPC response: ${safeStringify(value)}`,
    details: { what },
    suggestion: 'Check that the endpoint speaks the expected protocol version',
  });
}

function safeStringify(value: unknown): string {
  try {
    const text = JSON.stringify(value);
    return text === undefined ? String(value) : text.slice(0, 200);
  } catch {
    return String(value);
  }
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, what: string): JsonRecord {
  if (!isRecord(value)) throw invalidResponse(what, value);
  return value;
}

export function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw invalidResponse(what, value);
  return value;
}

export function readString(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') throw invalidResponse(key, value);
  return value;
}

export function readBoolean(record: JsonRecord, key: string): boolean {
  const value = record[key];
  if (typeof value !== 'boolean') throw invalidResponse(key, value);
  return value;
}

export function readNumber(record: JsonRecord, key: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) throw invalidResponse(key, value);
  return value;
}

export function readOptionalString(record: JsonRecord, key: string): string | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') throw invalidResponse(key, value);
  return value;
}

export function readOptionalNumber(record: JsonRecord, key: string): number | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw invalidResponse(key, value);
  return value;
}

/**
 * Decimal or hex string, or a safe integer, as bigint
 */
export function readBigInt(record: JsonRecord, key: string): bigint {
  const value = record[key];
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^(0x[0-9a-fA-F]+|\d+)$/.test(value)) return BigInt(value);
  throw invalidResponse(key, value);
}

export function readHex(record: JsonRecord, key: string): Hex {
  const value = record[key];
  if (!isHex(value)) throw invalidResponse(key, value);
  return value;
}

export function readHash(record: JsonRecord, key: string): Hash {
  const value = record[key];
  if (!isHash(value)) throw invalidResponse(key, value);
  return value;
}

export function readAddress(record: JsonRecord, key: string): Address {
  const value = record[key];
  if (!isAddress(value)) throw invalidResponse(key, value);
  return value;
}
