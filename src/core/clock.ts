/**
 * Injectable time source
 * All delays in the client go through a Clock so tests can run without real timers.
 */

import { WaitCancelledError } from '../wallet/errors.js';

export interface Clock {
  now(): number;
  /**
   * Resolve after `ms`; reject with WaitCancelledError if `signal` aborts first
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new WaitCancelledError('delay'));
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new WaitCancelledError('delay'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/**
 * Throw WaitCancelledError when the signal has already aborted
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation?: string): void {
  if (signal?.aborted) {
    throw new WaitCancelledError(operation);
  }
}
