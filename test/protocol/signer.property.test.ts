import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { DualSigner } from '../../src/protocol/signer.js';
import { buildTransfer } from '../../src/protocol/transaction.js';
import { closestPackableAmount } from '../../src/protocol/packing.js';
import { addr, RECIPIENT, rollupKey } from '../helpers/fakes.js';

const SENDER = addr('0x00000000000000000000000000000000000000a1');
const signer = new DualSigner();

const fields = fc.record({
  amount: fc.bigInt({ min: 1n, max: 10n ** 24n }).map(closestPackableAmount),
  nonce: fc.integer({ min: 0, max: 1_000_000 }),
  token: fc.integer({ min: 0, max: 65_535 }),
});

describe('signer property-based tests', () => {
  test.prop([fields], { numRuns: 25 })('signatures verify for the signed transaction', (f) => {
    const { tx } = buildTransfer({ accountId: 7, from: SENDER, to: RECIPIENT, fee: 0n, ...f });
    const { rollup } = signer.sign(tx, { rollupKey: rollupKey() });

    expect(signer.verify(tx, rollup)).toBe(true);
  });

  test.prop([fields, fc.integer({ min: 1, max: 1000 })], { numRuns: 25 })(
    'signatures do not verify once the nonce changes',
    (f, delta) => {
      const { tx } = buildTransfer({ accountId: 7, from: SENDER, to: RECIPIENT, fee: 0n, ...f });
      const { rollup } = signer.sign(tx, { rollupKey: rollupKey() });

      expect(signer.verify({ ...tx, nonce: tx.nonce + delta }, rollup)).toBe(false);
    }
  );
});
