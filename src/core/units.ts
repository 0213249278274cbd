/**
 * Token unit conversions
 * Decimal strings <-> integer base units
 */

/**
 * Parse a decimal string with given decimals
 * e.g., parseUnits("1.5", 18) = 1500000000000000000n
 * Excess fractional digits are rejected rather than truncated.
 */
export function parseUnits(value: string, decimals: number): bigint {
  assertDecimals(decimals);

  const normalized = value.trim();
  const negative = normalized.startsWith('-');
  const abs = negative ? normalized.slice(1) : normalized;
  const parts = abs.split('.');

  if (parts.length > 2 || abs === '' || abs === '.') {
    throw new Error(`Invalid number: ${value}`);
  }

  const intPart = parts[0] ?? '';
  const fracPart = parts[1] ?? '';

  if (!/^\d*$/.test(intPart) || !/^\d*$/.test(fracPart)) {
    throw new Error(`Invalid number: ${value}`);
  }

  if (fracPart.replace(/0+$/, '').length > decimals) {
    throw new Error(`Too many decimal places in ${value}: token has ${decimals}`);
  }

  const result = BigInt((intPart || '0') + fracPart.slice(0, decimals).padEnd(decimals, '0'));
  return negative ? -result : result;
}

/**
 * Format base units as a decimal string
 * e.g., formatUnits(1500000000000000000n, 18) = "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);

  const negative = value < 0n;
  const abs = negative ? -value : value;

  if (decimals === 0) {
    return negative ? `-${abs}` : abs.toString();
  }

  const str = abs.toString().padStart(decimals + 1, '0');
  const intPart = str.slice(0, -decimals);
  const trimmedFrac = str.slice(-decimals).replace(/0+$/, '');

  const result = trimmedFrac ? `${intPart}.${trimmedFrac}` : intPart;
  return negative ? `-${result}` : result;
}

/**
 * Format base units keeping at least one fractional digit ("1.0", "0.001")
 * Used in human-readable signing messages.
 */
export function formatUnitsFixed(value: bigint, decimals: number): string {
  const formatted = formatUnits(value, decimals);
  return formatted.includes('.') ? formatted : `${formatted}.0`;
}

/**
 * Increase `value` by basis points, rounding up
 * e.g., addBasisPoints(1000n, 250) = 1025n
 */
export function addBasisPoints(value: bigint, bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0) {
    throw new Error(`Invalid basis points: ${bps}`);
  }
  const scaled = value * BigInt(10_000 + bps);
  return (scaled + 9_999n) / 10_000n;
}

function assertDecimals(decimals: number): void {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }
}
