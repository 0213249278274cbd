import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { parseUnits, formatUnits, addBasisPoints } from '../../src/core/units.js';

describe('units property-based tests', () => {
  test.prop([fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n }), fc.integer({ min: 0, max: 24 })])(
    'formatUnits output parses back to the same value',
    (value, decimals) => {
      expect(parseUnits(formatUnits(value, decimals), decimals)).toBe(value);
    }
  );

  test.prop([fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 10_000 })])(
    'addBasisPoints never rounds down',
    (value, bps) => {
      const result = addBasisPoints(value, bps);
      expect(result * 10_000n).toBeGreaterThanOrEqual(value * BigInt(10_000 + bps));
      expect((result - 1n) * 10_000n).toBeLessThan(value * BigInt(10_000 + bps));
    }
  );
});
