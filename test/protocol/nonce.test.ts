import { describe, it, expect, beforeEach } from 'vitest';
import { AsyncMutex, NonceTracker } from '../../src/protocol/nonce.js';
import { RejectedError, TransientError, ValidationError, WaitCancelledError } from '../../src/wallet/errors.js';
import { toChecksumAddress } from '../../src/core/address.js';
import { FakeOperator, addr, recordingLogger } from '../helpers/fakes.js';

const ACCOUNT = addr('0x00000000000000000000000000000000000000a1');
const MIXED_CASE = toChecksumAddress(ACCOUNT);

const nonceMismatch = () => new RejectedError('nonce_mismatch', 'Nonce mismatch', -32000);

describe('AsyncMutex', () => {
  it('serialises callers in arrival order', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];
    let releaseFirst = (): void => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.withLock(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.withLock(async () => {
      order.push('second');
    });

    expect(mutex.isLocked).toBe(true);
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when the callback throws', async () => {
    const mutex = new AsyncMutex();

    await expect(mutex.withLock(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });
});

describe('NonceTracker', () => {
  let operator: FakeOperator;
  let logger: ReturnType<typeof recordingLogger>;
  let tracker: NonceTracker;

  beforeEach(() => {
    operator = new FakeOperator();
    operator.setAccount(ACCOUNT, { id: 7, nonce: 5 });
    logger = recordingLogger();
    tracker = new NonceTracker({ source: operator, logger });
  });

  describe('reading', () => {
    it('loads the nonce once and caches it', async () => {
      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(5);
      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(5);
      expect(operator.accountCalls).toBe(1);
    });

    it('shares the cache across address spellings', async () => {
      await tracker.getCurrentNonce(ACCOUNT);
      await tracker.getCurrentNonce(MIXED_CASE);
      expect(operator.accountCalls).toBe(1);
    });

    it('exposes the tracked account', async () => {
      await expect(tracker.getAccount(ACCOUNT)).resolves.toEqual({ address: ACCOUNT, id: 7, pubKeyHash: null, nonce: 5 });
    });

    it('reserves nonces with getNextNonce', async () => {
      expect(await tracker.getNextNonce(ACCOUNT)).toBe(5);
      expect(await tracker.getNextNonce(ACCOUNT)).toBe(6);
      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(7);
    });
  });

  describe('withNonce', () => {
    it('advances only after the callback resolves', async () => {
      const result = await tracker.withNonce(ACCOUNT, async ({ nonce, account }) => `${account.id}:${nonce}`);

      expect(result).toBe('7:5');
      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(6);
    });

    it('hands out distinct nonces to concurrent submissions', async () => {
      const nonces = await Promise.all(
        Array.from({ length: 5 }, () => tracker.withNonce(ACCOUNT, async ({ nonce }) => nonce))
      );

      expect(nonces).toEqual([5, 6, 7, 8, 9]);
      expect(operator.accountCalls).toBe(1);
    });

    it('resyncs immediately after a nonce mismatch', async () => {
      await tracker.getCurrentNonce(ACCOUNT);
      operator.setAccount(ACCOUNT, { id: 7, nonce: 6 });

      await expect(
        tracker.withNonce(ACCOUNT, async () => {
          throw nonceMismatch();
        })
      ).rejects.toMatchObject({ reason: 'nonce_mismatch' });

      expect(operator.accountCalls).toBe(2);
      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(6);
      expect(logger.entries).toContainEqual({
        level: 'info',
        message: '[nonce] Nonce resynced after mismatch',
        context: { address: ACCOUNT, nonce: 6 },
      });
    });

    it('stays invalidated when the resync fails', async () => {
      let loads = 0;
      const failing = new NonceTracker({
        source: {
          getAccountState: async (address) => {
            loads++;
            if (loads > 1) throw new Error('operator down');
            return operator.getAccountState(address);
          },
        },
        logger,
      });
      await failing.getCurrentNonce(ACCOUNT);

      await expect(
        failing.withNonce(ACCOUNT, async () => {
          throw nonceMismatch();
        })
      ).rejects.toBeInstanceOf(RejectedError);

      expect(logger.entries.at(-1)).toEqual({
        level: 'warn',
        message: '[nonce] Resync after nonce mismatch failed',
        context: { address: ACCOUNT, error: 'operator down' },
      });
      await expect(failing.getCurrentNonce(ACCOUNT)).rejects.toThrow('operator down');
    });

    it('invalidates the cache on other rejections and transient failures', async () => {
      await tracker.getCurrentNonce(ACCOUNT);

      await expect(
        tracker.withNonce(ACCOUNT, async () => {
          throw new RejectedError('insufficient_balance', 'Not enough balance');
        })
      ).rejects.toThrow('Not enough balance');
      expect(operator.accountCalls).toBe(1);

      await tracker.getCurrentNonce(ACCOUNT);
      expect(operator.accountCalls).toBe(2);

      await expect(
        tracker.withNonce(ACCOUNT, async () => {
          throw new TransientError({ code: 'REQUEST_TIMEOUT', message: 'timed out' });
        })
      ).rejects.toBeInstanceOf(TransientError);
      await tracker.getCurrentNonce(ACCOUNT);
      expect(operator.accountCalls).toBe(3);
    });

    it('keeps the cache for local failures', async () => {
      await expect(
        tracker.withNonce(ACCOUNT, async () => {
          throw new ValidationError({ message: 'bad field' });
        })
      ).rejects.toThrow('bad field');

      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(5);
      expect(operator.accountCalls).toBe(1);
    });

    it('reloads after a cancelled submission', async () => {
      await expect(
        tracker.withNonce(ACCOUNT, async ({ nonce }) => {
          // the operator applied the nonce before the caller gave up
          operator.setAccount(ACCOUNT, { id: 7, nonce: nonce + 1 });
          throw new WaitCancelledError('tx_submit');
        })
      ).rejects.toBeInstanceOf(WaitCancelledError);

      expect(await tracker.getNextNonce(ACCOUNT)).toBe(6);
      expect(operator.accountCalls).toBe(2);
      expect(logger.entries).toContainEqual({
        level: 'debug',
        message: '[nonce] Nonce invalidated',
        context: { address: ACCOUNT, code: 'WAIT_CANCELLED' },
      });
    });

    it('reloads after a failure of unknown origin', async () => {
      await expect(
        tracker.withNonce(ACCOUNT, async () => {
          throw new Error('socket hang up');
        })
      ).rejects.toThrow('socket hang up');

      await tracker.getCurrentNonce(ACCOUNT);
      expect(operator.accountCalls).toBe(2);
      expect(logger.entries).toContainEqual({
        level: 'debug',
        message: '[nonce] Nonce invalidated',
        context: { address: ACCOUNT, code: 'UNKNOWN_ERROR' },
      });
    });
  });

  describe('cache control', () => {
    it('reloads after sync and invalidate', async () => {
      await tracker.getNextNonce(ACCOUNT);

      await expect(tracker.sync(ACCOUNT)).resolves.toMatchObject({ nonce: 5 });
      tracker.invalidate(MIXED_CASE);
      await tracker.getCurrentNonce(ACCOUNT);

      expect(operator.accountCalls).toBe(3);
    });

    it('ignores invalidation of an unknown account', () => {
      expect(() => tracker.invalidate(ACCOUNT)).not.toThrow();
    });

    it('records an accepted key hash without reloading', async () => {
      await tracker.getAccount(ACCOUNT);
      tracker.recordPubKeyHash(ACCOUNT, `pkh:${'ab'.repeat(20)}`);

      await expect(tracker.getAccount(ACCOUNT)).resolves.toMatchObject({ pubKeyHash: `pkh:${'ab'.repeat(20)}` });
      expect(operator.accountCalls).toBe(1);
    });

    it('applies the error policy to failures reported later', async () => {
      await tracker.getCurrentNonce(ACCOUNT);
      operator.setAccount(ACCOUNT, { id: 7, nonce: 9 });

      await tracker.onSubmissionRejected(ACCOUNT, nonceMismatch());

      expect(await tracker.getCurrentNonce(ACCOUNT)).toBe(9);
      expect(operator.accountCalls).toBe(2);
    });
  });
});
