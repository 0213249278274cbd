/**
 * Packed amounts
 *
 * The rollup stores amounts and fees as `mantissa * 10^exponent`:
 *   amounts: 35-bit mantissa, 5-bit exponent (5 bytes)
 *   fees:    11-bit mantissa, 5-bit exponent (2 bytes)
 * The packed bytes hold `(mantissa << expBits) | exponent`, big-endian.
 */

import { bytesToBigInt, uintToBytes } from '../core/hex.js';
import { InvalidAmountError } from '../wallet/errors.js';

export interface PackingFormat {
  readonly name: 'amount' | 'fee';
  readonly expBits: number;
  readonly mantBits: number;
  readonly byteLength: number;
}

export const AMOUNT_FORMAT: PackingFormat = { name: 'amount', expBits: 5, mantBits: 35, byteLength: 5 };
export const FEE_FORMAT: PackingFormat = { name: 'fee', expBits: 5, mantBits: 11, byteLength: 2 };

const BASE = 10n;

function maxMantissa(format: PackingFormat): bigint {
  return (1n << BigInt(format.mantBits)) - 1n;
}

function maxExponent(format: PackingFormat): number {
  return (1 << format.expBits) - 1;
}

/**
 * Largest value the format can hold
 */
export function maxPackable(format: PackingFormat): bigint {
  return maxMantissa(format) * BASE ** BigInt(maxExponent(format));
}

function split(value: bigint, format: PackingFormat): { mantissa: bigint; exponent: number } | null {
  if (value < 0n) return null;

  const maxMant = maxMantissa(format);
  let mantissa = value;
  let exponent = 0;

  while (mantissa > maxMant) {
    if (mantissa % BASE !== 0n) return null;
    mantissa /= BASE;
    exponent++;
  }

  return exponent > maxExponent(format) ? null : { mantissa, exponent };
}

export function isPackable(value: bigint, format: PackingFormat): boolean {
  return split(value, format) !== null;
}

function assertInRange(value: bigint, format: PackingFormat): void {
  if (value < 0n) {
    throw new InvalidAmountError(format.name, value, 'must not be negative');
  }
  if (value > maxPackable(format)) {
    throw new InvalidAmountError(format.name, value, `exceeds the largest packable ${format.name}`);
  }
}

/**
 * Smallest exponent at which `value` scaled down fits the mantissa
 */
function minExponent(value: bigint, format: PackingFormat, round: 'down' | 'up'): number {
  const maxMant = maxMantissa(format);
  let exponent = 0;
  for (;;) {
    const divisor = BASE ** BigInt(exponent);
    const scaled = round === 'down' ? value / divisor : (value + divisor - 1n) / divisor;
    if (scaled <= maxMant) return exponent;
    exponent++;
  }
}

/**
 * Nearest packable value not above `value`
 */
export function closestPackable(value: bigint, format: PackingFormat): bigint {
  assertInRange(value, format);
  if (value <= maxMantissa(format)) return value;

  const exponent = minExponent(value, format, 'down');
  const divisor = BASE ** BigInt(exponent);
  const truncated = (value / divisor) * divisor;
  // With the exponent one lower, a full mantissa can beat the truncation
  const fullMantissa = maxMantissa(format) * BASE ** BigInt(exponent - 1);

  return truncated > fullMantissa ? truncated : fullMantissa;
}

/**
 * Nearest packable value not below `value`
 */
export function closestGreaterOrEqPackable(value: bigint, format: PackingFormat): bigint {
  if (value < 0n) {
    throw new InvalidAmountError(format.name, value, 'must not be negative');
  }
  if (isPackable(value, format)) return value;

  const exponent = minExponent(value, format, 'up');
  if (exponent > maxExponent(format)) {
    throw new InvalidAmountError(format.name, value, `exceeds the largest packable ${format.name}`);
  }
  const divisor = BASE ** BigInt(exponent);
  return ((value + divisor - 1n) / divisor) * divisor;
}

/**
 * Encode an exactly packable value
 */
export function pack(value: bigint, format: PackingFormat): Uint8Array {
  const parts = split(value, format);
  if (parts === null) {
    throw new InvalidAmountError(format.name, value, 'is not exactly packable');
  }
  const word = (parts.mantissa << BigInt(format.expBits)) | BigInt(parts.exponent);
  return uintToBytes(word, format.byteLength);
}

export function unpack(bytes: Uint8Array, format: PackingFormat): bigint {
  if (bytes.length !== format.byteLength) {
    throw new InvalidAmountError(format.name, bytes.length, `packed form must be ${format.byteLength} bytes`);
  }
  const word = bytesToBigInt(bytes);
  const exponent = word & ((1n << BigInt(format.expBits)) - 1n);
  const mantissa = word >> BigInt(format.expBits);
  return mantissa * BASE ** exponent;
}

export const packAmount = (value: bigint): Uint8Array => pack(value, AMOUNT_FORMAT);
export const packFee = (value: bigint): Uint8Array => pack(value, FEE_FORMAT);
export const isPackableAmount = (value: bigint): boolean => isPackable(value, AMOUNT_FORMAT);
export const isPackableFee = (value: bigint): boolean => isPackable(value, FEE_FORMAT);
export const closestPackableAmount = (value: bigint): bigint => closestPackable(value, AMOUNT_FORMAT);
export const closestPackableFee = (value: bigint): bigint => closestPackable(value, FEE_FORMAT);
