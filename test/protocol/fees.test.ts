import { describe, it, expect, beforeEach } from 'vitest';
import { FeeEstimator } from '../../src/protocol/fees.js';
import { FeeTooHighError, FeeUnavailableError, RejectedError, TransientError } from '../../src/wallet/errors.js';
import { FakeOperator, addr, recordingLogger } from '../helpers/fakes.js';

const ACCOUNT = addr('0x00000000000000000000000000000000000000a1');

describe('FeeEstimator', () => {
  let operator: FakeOperator;

  beforeEach(() => {
    operator = new FakeOperator();
  });

  it('passes through an estimate that is already packable', async () => {
    const { fee, estimate } = await new FeeEstimator({ source: operator }).suggest('Transfer', 'ETH', ACCOUNT);

    expect(fee).toBe(10n ** 15n);
    expect(estimate.totalFee).toBe(10n ** 15n);
    expect(operator.feeCalls).toEqual([{ txType: 'Transfer', token: 'ETH' }]);
  });

  it('rounds up to the next packable fee', async () => {
    operator.totalFee = 2049n;
    const { fee } = await new FeeEstimator({ source: operator }).suggest('Transfer', 0, ACCOUNT);

    expect(fee).toBe(2050n);
  });

  it('adds the configured tolerance', async () => {
    operator.totalFee = 1000n;
    const estimator = new FeeEstimator({ source: operator, toleranceBps: 1000 });

    expect((await estimator.suggest('Withdraw', 0, ACCOUNT)).fee).toBe(1100n);
    expect((await estimator.suggest('Withdraw', 0, ACCOUNT, { toleranceBps: 250 })).fee).toBe(1025n);
  });

  it('logs the suggestion', async () => {
    const logger = recordingLogger();
    await new FeeEstimator({ source: operator, logger }).suggest('Transfer', 'ETH', ACCOUNT);

    expect(logger.entries).toEqual([
      {
        level: 'debug',
        message: '[fees] Suggested fee',
        context: { txType: 'Transfer', token: 'ETH', totalFee: '1000000000000000', fee: '1000000000000000', bps: 0 },
      },
    ]);
  });

  it('refuses a fee above the maximum', async () => {
    const estimator = new FeeEstimator({ source: operator });

    await expect(estimator.suggest('Transfer', 'ETH', ACCOUNT, { maxFee: 999n })).rejects.toThrow(
      'Fee 1000000000000000 ETH exceeds maximum 999'
    );
    await expect(estimator.suggest('Transfer', 'ETH', ACCOUNT, { maxFee: 10n ** 15n })).resolves.toMatchObject({
      fee: 10n ** 15n,
    });
    expect(() => estimator.assertWithinMax(2n, 1n)).toThrow(FeeTooHighError);
  });

  it('reports pairs the operator cannot price', async () => {
    operator.feeFailure = new RejectedError('other', 'Chosen token is not suitable for paying fees');
    const error = await new FeeEstimator({ source: operator }).estimate('Transfer', 'USDC', ACCOUNT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FeeUnavailableError);
    expect(error).toMatchObject({
      code: 'FEE_UNAVAILABLE',
      message: 'Operator cannot price Transfer in USDC: Chosen token is not suitable for paying fees',
    });
  });

  it('lets transient failures through unchanged', async () => {
    const transient = new TransientError({ code: 'REQUEST_TIMEOUT', message: 'timed out' });
    operator.feeFailure = transient;

    await expect(new FeeEstimator({ source: operator }).suggest('Transfer', 'ETH', ACCOUNT)).rejects.toBe(transient);
  });
});
