/**
 * Transaction confirmation state machine
 *
 *   sent -> pending -> committed -> verified -> executed
 *                \_________\___________\________> failed(reason)
 *
 * Transitions come only from observed operator status. The machine never moves
 * backwards and never leaves `executed` or `failed`.
 */

import type { TxHash } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { PollSchedule } from '../core/polling.js';
import { pollUntil } from '../core/polling.js';
import { TimeoutError, TransientError } from '../wallet/errors.js';

export type ConfirmationStage = 'sent' | 'pending' | 'committed' | 'verified' | 'executed' | 'failed';

export type TargetStage = 'pending' | 'committed' | 'verified' | 'executed';

/**
 * Status as reported by the operator
 */
export type ObservedStatus =
  | { status: 'unknown' }
  | { status: 'pending' }
  | { status: 'committed' | 'verified' | 'executed'; blockNumber: number }
  | { status: 'failed'; reason: string };

export type ConfirmationState =
  | { stage: 'sent' }
  | { stage: 'pending' }
  | { stage: 'committed' | 'verified' | 'executed'; blockNumber: number }
  | { stage: 'failed'; reason: string };

const RANK: Readonly<Record<Exclude<ConfirmationStage, 'failed'>, number>> = {
  sent: 0,
  pending: 1,
  committed: 2,
  verified: 3,
  executed: 4,
};

export function isTerminal(state: ConfirmationState): boolean {
  return state.stage === 'executed' || state.stage === 'failed';
}

/**
 * Whether `state` satisfies a wait for `target`; a failure ends every wait
 */
export function hasReached(state: ConfirmationState, target: TargetStage): boolean {
  return state.stage === 'failed' || RANK[state.stage] >= RANK[target];
}

/**
 * Pure transition function
 */
export function applyStatus(state: ConfirmationState, observed: ObservedStatus): ConfirmationState {
  if (state.stage === 'executed' || state.stage === 'failed' || observed.status === 'unknown') return state;

  switch (observed.status) {
    case 'failed':
      return { stage: 'failed', reason: observed.reason };
    case 'pending':
      return RANK[state.stage] < RANK.pending ? { stage: 'pending' } : state;
    default:
      return RANK[state.stage] < RANK[observed.status]
        ? { stage: observed.status, blockNumber: observed.blockNumber }
        : state;
  }
}

/**
 * Observed status that is behind the current state
 */
export function isRegression(state: ConfirmationState, observed: ObservedStatus): boolean {
  if (state.stage === 'failed' || observed.status === 'unknown' || observed.status === 'failed') return false;
  return RANK[observed.status] < RANK[state.stage];
}

export interface StatusSource {
  getTransactionStatus(txHash: TxHash, options?: { signal?: AbortSignal }): Promise<ObservedStatus>;
}

export interface WaitOptions extends Partial<PollSchedule> {
  signal?: AbortSignal;
}

export interface TransactionTrackerConfig {
  txHash: TxHash;
  source: StatusSource;
  clock?: Clock;
  logger?: Logger;
  /** Defaults for every wait */
  polling?: Partial<PollSchedule>;
  initialState?: ConfirmationState;
}

export const DEFAULT_POLL_SCHEDULE: PollSchedule = {
  pollInterval: 1_000,
  backoffMultiplier: 1.5,
  maxPollInterval: 15_000,
  maxWait: 600_000,
};

/**
 * Drives one submitted transaction through the state machine.
 *
 * ```typescript
 * const tracker = new TransactionTracker({ txHash, source: operator });
 * const state = await tracker.waitFor('verified', { maxWait: 60_000 });
 * if (state.stage === 'failed') console.log(state.reason);
 * ```
 */
export class TransactionTracker {
  readonly txHash: TxHash;
  private readonly source: StatusSource;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly polling: PollSchedule;
  private current: ConfirmationState;
  private pollCount = 0;

  constructor(config: TransactionTrackerConfig) {
    this.txHash = config.txHash;
    this.source = config.source;
    this.clock = config.clock ?? systemClock;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'confirmation');
    this.polling = { ...DEFAULT_POLL_SCHEDULE, ...config.polling };
    this.current = config.initialState ?? { stage: 'sent' };
  }

  get state(): ConfirmationState {
    return this.current;
  }

  /** Number of status queries made so far */
  get polls(): number {
    return this.pollCount;
  }

  /**
   * One status query, applied to the state machine
   */
  async poll(signal?: AbortSignal): Promise<ConfirmationState> {
    this.pollCount++;
    const observed = await this.source.getTransactionStatus(this.txHash, signal ? { signal } : {});
    const previous = this.current;

    if (isRegression(previous, observed)) {
      this.logger.warn('Ignoring status regression', { txHash: this.txHash, stage: previous.stage, observed: observed.status });
    }

    this.current = applyStatus(previous, observed);
    if (this.current !== previous) {
      this.logger.debug('Transaction advanced', { txHash: this.txHash, from: previous.stage, to: this.current.stage });
    }
    return this.current;
  }

  /**
   * Poll until `target` (or failure) is reached.
   * Throws TimeoutError carrying the last state when the budget runs out; the
   * transaction itself is unaffected and tracking may resume later.
   */
  async waitFor(target: TargetStage, options: WaitOptions = {}): Promise<ConfirmationState> {
    if (hasReached(this.current, target)) return this.current;

    const { signal, ...overrides } = options;
    const schedule: PollSchedule = { ...this.polling, ...overrides };

    const outcome = await pollUntil<ConfirmationState>(
      async () => {
        try {
          const state = await this.poll(signal);
          return hasReached(state, target) ? { done: true, value: state } : { done: false };
        } catch (error) {
          if (error instanceof TransientError) {
            this.logger.warn('Status poll failed, counting as missed', { txHash: this.txHash, error: error.message });
            return { done: false };
          }
          throw error;
        }
      },
      { ...schedule, clock: this.clock, ...(signal ? { signal } : {}), operation: `transaction ${this.txHash}` }
    );

    if (outcome.status === 'done') return outcome.value;

    throw new TimeoutError<ConfirmationState>(`transaction ${this.txHash} to reach ${target}`, outcome.elapsed, this.current, {
      txHash: this.txHash,
      target,
      attempts: outcome.attempts,
      stage: this.current.stage,
    });
  }
}
