/**
 * Priority operation tracking
 *
 * Deposits and full exits start on L1. Following one to L2 takes two waits:
 *
 *   submitted -> awaitingSerialId -> serialIdKnown -> l2Pending -> l2Confirmed
 *                                                              \-> l2Failed
 *
 * The first wait is for the L1 receipt, whose NewPriorityRequest event
 * carries the serial id. The second polls the operator by serial id. A timed
 * out wait reports the last state, so a caller holding the serial id can
 * resume later.
 */

import type { Address, Hash, Hex, L1Receipt, TokenInfo } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { PollSchedule } from '../core/polling.js';
import { pollUntil } from '../core/polling.js';
import { RejectedError, TimeoutError, TransientError, ValidationError } from '../wallet/errors.js';
import { DEFAULT_POLL_SCHEDULE } from './confirmation.js';
import type { PriorityOpType, ReceiptSource } from './ethereum.js';
import { findPriorityRequest } from './ethereum.js';
import type { RequestOptions } from './transport.js';

/**
 * Operator view of a priority operation (`ethop_info`)
 */
export interface PriorityOpStatus {
  readonly executed: boolean;
  readonly block: { readonly blockNumber: number; readonly committed: boolean; readonly verified: boolean } | null;
  readonly success?: boolean;
  readonly failReason?: string;
}

export interface PriorityOperation {
  readonly serialId: bigint;
  readonly opType: PriorityOpType;
  readonly payload: Hex;
  readonly sender: Address;
  readonly expirationBlock: bigint;
  readonly l1TxHash: Hash;
}

export type ConfirmationLevel = 'committed' | 'verified';

/**
 * `operation` is null when tracking was resumed from a bare serial id
 */
export type PriorityState =
  | { stage: 'submitted'; l1TxHash: Hash }
  | { stage: 'awaitingSerialId'; l1TxHash: Hash; l1BlockNumber: number }
  | { stage: 'serialIdKnown'; serialId: bigint; operation: PriorityOperation | null }
  | { stage: 'l2Pending'; serialId: bigint; operation: PriorityOperation | null }
  | { stage: 'l2Confirmed'; serialId: bigint; operation: PriorityOperation | null; blockNumber: number; level: ConfirmationLevel }
  | { stage: 'l2Failed'; serialId: bigint; operation: PriorityOperation | null; reason: string };

export type PriorityResult = Extract<PriorityState, { stage: 'l2Confirmed' | 'l2Failed' }>;

/**
 * L1 request a caller's submitter turns into a contract call
 */
export type PriorityRequest =
  | { type: 'Deposit'; from: Address; to: Address; token: TokenInfo; amount: bigint }
  | { type: 'FullExit'; accountId: number; address: Address; token: TokenInfo };

/**
 * Sends priority requests to the L1 contract; supplied by the caller
 */
export interface PriorityOperationSubmitter {
  submit(request: PriorityRequest): Promise<Hash>;
}

export interface PriorityStatusSource {
  getPriorityOperationStatus(serialId: bigint, options?: RequestOptions): Promise<PriorityOpStatus>;
}

export interface PriorityWaitOptions {
  signal?: AbortSignal;
  /** Budget for the L1 receipt wait */
  l1?: Partial<PollSchedule>;
  /** Budget for the operator wait */
  l2?: Partial<PollSchedule>;
  confirmation?: ConfirmationLevel;
  onStateChange?: (state: PriorityState) => void;
}

export interface PriorityOperationTrackerConfig {
  receipts: ReceiptSource;
  operator: PriorityStatusSource;
  clock?: Clock;
  logger?: Logger;
  polling?: Partial<PollSchedule>;
  /** Only events from this contract count */
  mainContract?: Address;
  confirmation?: ConfirmationLevel;
}

/**
 * Classify one operator observation
 */
export function priorityOutcome(
  status: PriorityOpStatus,
  level: ConfirmationLevel
): { stage: 'l2Pending' } | { stage: 'l2Confirmed'; blockNumber: number } | { stage: 'l2Failed'; reason: string } {
  if (status.success === false) {
    return { stage: 'l2Failed', reason: status.failReason ?? 'unknown reason' };
  }
  const block = status.block;
  if (status.executed && block !== null && (level === 'verified' ? block.verified : block.committed)) {
    return { stage: 'l2Confirmed', blockNumber: block.blockNumber };
  }
  return { stage: 'l2Pending' };
}

/**
 * Follows priority operations from L1 receipt to L2 outcome.
 *
 * ```typescript
 * const tracker = new PriorityOperationTracker({ receipts: ethereum, operator });
 * try {
 *   const result = await tracker.track(depositTxHash);
 * } catch (error) {
 *   if (error instanceof TimeoutError && error.lastState?.stage === 'l2Pending') {
 *     await tracker.resume(error.lastState.serialId);
 *   }
 * }
 * ```
 */
export class PriorityOperationTracker {
  private readonly receipts: ReceiptSource;
  private readonly operator: PriorityStatusSource;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly polling: PollSchedule;
  private readonly mainContract: Address | undefined;
  private readonly confirmation: ConfirmationLevel;

  constructor(config: PriorityOperationTrackerConfig) {
    this.receipts = config.receipts;
    this.operator = config.operator;
    this.clock = config.clock ?? systemClock;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'priority');
    this.polling = { ...DEFAULT_POLL_SCHEDULE, ...config.polling };
    this.mainContract = config.mainContract;
    this.confirmation = config.confirmation ?? 'committed';
  }

  /**
   * Follow an L1 transaction carrying a priority request until the operator settles it
   */
  async track(l1TxHash: Hash, options: PriorityWaitOptions = {}): Promise<PriorityResult> {
    const emit = this.emitter(options);
    emit({ stage: 'submitted', l1TxHash });

    const operation = await this.waitForSerialId(l1TxHash, options, emit);
    return this.waitForOperator({ stage: 'serialIdKnown', serialId: operation.serialId, operation }, options, emit);
  }

  /**
   * Continue tracking from a known serial id
   */
  async resume(serialId: bigint, options: PriorityWaitOptions = {}): Promise<PriorityResult> {
    return this.waitForOperator({ stage: 'serialIdKnown', serialId, operation: null }, options, this.emitter(options));
  }

  private emitter(options: PriorityWaitOptions): (state: PriorityState) => void {
    return (state) => {
      this.logger.debug('Priority operation state', {
        stage: state.stage,
        ...('serialId' in state ? { serialId: state.serialId.toString() } : { l1TxHash: state.l1TxHash }),
      });
      options.onStateChange?.(state);
    };
  }

  private async waitForSerialId(
    l1TxHash: Hash,
    options: PriorityWaitOptions,
    emit: (state: PriorityState) => void
  ): Promise<PriorityOperation> {
    const { signal } = options;
    const outcome = await pollUntil<L1Receipt>(
      async () => {
        try {
          const receipt = await this.receipts.getTransactionReceipt(l1TxHash, signal ? { signal } : {});
          return receipt === null ? { done: false } : { done: true, value: receipt };
        } catch (error) {
          if (error instanceof TransientError) {
            this.logger.warn('Receipt poll failed, counting as missed', { l1TxHash, error: error.message });
            return { done: false };
          }
          throw error;
        }
      },
      { ...this.polling, ...options.l1, clock: this.clock, ...(signal ? { signal } : {}), operation: `receipt ${l1TxHash}` }
    );

    if (outcome.status === 'timeout') {
      const lastState: PriorityState = { stage: 'submitted', l1TxHash };
      throw new TimeoutError<PriorityState>(`L1 receipt for ${l1TxHash}`, outcome.elapsed, lastState, {
        l1TxHash,
        attempts: outcome.attempts,
      });
    }

    const receipt = outcome.value;
    if (receipt.status === 'reverted') {
      throw new RejectedError('l1_reverted', `L1 transaction ${l1TxHash} reverted`, undefined, {
        l1TxHash,
        blockNumber: receipt.blockNumber,
      });
    }
    emit({ stage: 'awaitingSerialId', l1TxHash, l1BlockNumber: receipt.blockNumber });

    const event = findPriorityRequest(receipt.logs, this.mainContract);
    if (event === null) {
      throw new ValidationError({
        code: 'PRIORITY_REQUEST_NOT_FOUND',
        message: `L1 transaction ${l1TxHash} emitted no NewPriorityRequest event`,
        details: { l1TxHash, mainContract: this.mainContract, logs: receipt.logs.length },
        suggestion: 'Check that the transaction called the rollup main contract',
      });
    }

    return { ...event, l1TxHash };
  }

  private async waitForOperator(
    initial: Extract<PriorityState, { stage: 'serialIdKnown' }>,
    options: PriorityWaitOptions,
    emit: (state: PriorityState) => void
  ): Promise<PriorityResult> {
    const { signal } = options;
    const { serialId, operation } = initial;
    const level = options.confirmation ?? this.confirmation;
    let current: PriorityState = initial;
    emit(initial);

    const outcome = await pollUntil<PriorityResult>(
      async () => {
        let status: PriorityOpStatus;
        try {
          status = await this.operator.getPriorityOperationStatus(serialId, signal ? { signal } : {});
        } catch (error) {
          if (error instanceof TransientError) {
            this.logger.warn('Priority poll failed, counting as missed', { serialId: serialId.toString(), error: error.message });
            return { done: false };
          }
          throw error;
        }

        if (current.stage === 'serialIdKnown') {
          current = { stage: 'l2Pending', serialId, operation };
          emit(current);
        }

        const result = priorityOutcome(status, level);
        switch (result.stage) {
          case 'l2Pending':
            return { done: false };
          case 'l2Confirmed': {
            const state: PriorityResult = { stage: 'l2Confirmed', serialId, operation, blockNumber: result.blockNumber, level };
            current = state;
            emit(state);
            return { done: true, value: state };
          }
          case 'l2Failed': {
            const state: PriorityResult = { stage: 'l2Failed', serialId, operation, reason: result.reason };
            current = state;
            emit(state);
            return { done: true, value: state };
          }
        }
      },
      {
        ...this.polling,
        ...options.l2,
        clock: this.clock,
        ...(signal ? { signal } : {}),
        operation: `priority operation ${serialId}`,
      }
    );

    if (outcome.status === 'done') return outcome.value;

    throw new TimeoutError<PriorityState>(`priority operation ${serialId} to reach ${level}`, outcome.elapsed, current, {
      serialId: serialId.toString(),
      attempts: outcome.attempts,
      stage: current.stage,
    });
  }
}
