import { describe, it, expect } from 'vitest';
import { backoffDelay, pollUntil } from '../../src/core/polling.js';
import type { PollStep } from '../../src/core/polling.js';
import { WaitCancelledError } from '../../src/wallet/errors.js';
import { FakeClock } from '../helpers/fakes.js';

const schedule = { pollInterval: 100, backoffMultiplier: 2, maxPollInterval: 1_000, maxWait: 10_000 };

function doneAfter(n: number): (attempt: number) => Promise<PollStep<string>> {
  return async (attempt) => (attempt >= n ? { done: true, value: `after ${attempt}` } : { done: false });
}

describe('backoffDelay', () => {
  it('starts at the poll interval', () => {
    expect(backoffDelay(1, schedule)).toBe(100);
    expect(backoffDelay(0, schedule)).toBe(100);
  });

  it('multiplies and caps', () => {
    expect(backoffDelay(3, schedule)).toBe(400);
    expect(backoffDelay(10, schedule)).toBe(1_000);
  });
});

describe('pollUntil', () => {
  it('polls immediately and returns the value', async () => {
    const clock = new FakeClock();

    await expect(pollUntil(doneAfter(1), { ...schedule, clock })).resolves.toEqual({
      status: 'done',
      value: 'after 1',
      attempts: 1,
      elapsed: 0,
    });
    expect(clock.sleeps).toEqual([]);
  });

  it('backs off between polls', async () => {
    const clock = new FakeClock();

    const outcome = await pollUntil(doneAfter(4), { ...schedule, clock });

    expect(outcome).toEqual({ status: 'done', value: 'after 4', attempts: 4, elapsed: 700 });
    expect(clock.sleeps).toEqual([100, 200, 400]);
  });

  it('stops at maxAttempts', async () => {
    const clock = new FakeClock();

    await expect(pollUntil(doneAfter(10), { ...schedule, maxAttempts: 2, clock })).resolves.toEqual({
      status: 'timeout',
      attempts: 2,
      elapsed: 100,
    });
  });

  it('never sleeps past maxWait', async () => {
    const clock = new FakeClock();

    const outcome = await pollUntil(doneAfter(100), { ...schedule, maxWait: 250, clock });

    expect(clock.sleeps).toEqual([100, 150]);
    expect(outcome).toEqual({ status: 'timeout', attempts: 3, elapsed: 250 });
  });

  it('throws when cancelled', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    const check = async (attempt: number): Promise<PollStep<string>> => {
      if (attempt === 2) controller.abort();
      return { done: false };
    };

    await expect(
      pollUntil(check, { ...schedule, clock, signal: controller.signal, operation: 'deposit' })
    ).rejects.toThrow('Waiting for delay was cancelled');
  });

  it('names the operation when aborted before a poll', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await pollUntil(doneAfter(1), { ...schedule, clock: new FakeClock(), signal: controller.signal, operation: 'deposit' }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(WaitCancelledError);
    expect(error).toMatchObject({ message: 'Waiting for deposit was cancelled' });
  });
});
