/**
 * Polling with exponential backoff
 * Shared by transaction confirmation and priority-operation tracking.
 */

import type { Clock } from './clock.js';
import { throwIfAborted } from './clock.js';

export interface PollSchedule {
  /** First delay between polls (ms) */
  pollInterval: number;
  /** Factor applied to the delay after each poll */
  backoffMultiplier: number;
  /** Upper bound for a single delay (ms) */
  maxPollInterval: number;
  /** Total time budget (ms) */
  maxWait: number;
  /** Optional cap on the number of polls */
  maxAttempts?: number;
}

export interface PollOptions extends PollSchedule {
  clock: Clock;
  signal?: AbortSignal;
  operation?: string;
}

export type PollStep<T> = { done: true; value: T } | { done: false };

export type PollOutcome<T> =
  | { status: 'done'; value: T; attempts: number; elapsed: number }
  | { status: 'timeout'; attempts: number; elapsed: number };

/**
 * Delay before poll number `attempt + 1`, given `attempt` polls so far (1-based)
 */
export function backoffDelay(attempt: number, schedule: PollSchedule): number {
  const raw = schedule.pollInterval * Math.pow(schedule.backoffMultiplier, Math.max(0, attempt - 1));
  return Math.min(raw, schedule.maxPollInterval);
}

/**
 * Call `check` until it reports done, the attempt cap is hit or `maxWait` elapses.
 * The first poll runs immediately. Aborting throws WaitCancelledError.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollStep<T>>,
  options: PollOptions
): Promise<PollOutcome<T>> {
  const { clock, signal } = options;
  const start = clock.now();
  let attempts = 0;

  for (;;) {
    throwIfAborted(signal, options.operation);
    attempts++;

    const step = await check(attempts);
    const elapsed = clock.now() - start;

    if (step.done) {
      return { status: 'done', value: step.value, attempts, elapsed };
    }

    if (options.maxAttempts !== undefined && attempts >= options.maxAttempts) {
      return { status: 'timeout', attempts, elapsed };
    }

    const remaining = options.maxWait - elapsed;
    if (remaining <= 0) {
      return { status: 'timeout', attempts, elapsed };
    }

    await clock.sleep(Math.min(backoffDelay(attempts, options), remaining), signal);
  }
}
