/**
 * Client configuration
 * One explicit object per client; every component receives its settings from here.
 */

import type { Address } from '../core/types.js';
import { isAddress } from '../core/address.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import { noopLogger } from '../core/logger.js';
import type { PollSchedule } from '../core/polling.js';
import { DEFAULT_POLL_SCHEDULE } from '../protocol/confirmation.js';
import type { ConfirmationLevel } from '../protocol/priority.js';
import type { L1SignaturePolicy } from '../protocol/signer.js';
import { ValidationError } from './errors.js';

export type NetworkPreset = 'localhost';

export interface NetworkEndpoints {
  readonly operatorUrl: string;
  readonly l1RpcUrl: string;
}

export const NETWORKS: Readonly<Record<NetworkPreset, NetworkEndpoints>> = {
  localhost: {
    operatorUrl: 'http://127.0.0.1:3030',
    l1RpcUrl: 'http://127.0.0.1:8545',
  },
};

export interface RollupClientConfig {
  /** Operator JSON-RPC endpoint; taken from `network` when omitted */
  operatorUrl?: string;
  /** L1 node endpoint, needed for priority-operation tracking */
  l1RpcUrl?: string;
  network?: NetworkPreset;

  /** Per-request timeout (ms) */
  requestTimeout?: number;
  retries?: number;
  retryBaseDelay?: number;
  retryMaxDelay?: number;
  headers?: Record<string, string>;

  polling?: Partial<PollSchedule>;

  l1SignaturePolicy?: L1SignaturePolicy;
  /** Added to fee estimates, in basis points */
  feeToleranceBps?: number;
  priorityConfirmation?: ConfirmationLevel;
  /** Rollup main contract; priority events from other contracts are ignored */
  mainContract?: string;

  /** Transactions whose status is kept for waitForTransaction */
  trackedTransactions?: number;

  logger?: Logger;
  clock?: Clock;
  random?: () => number;
}

export interface ResolvedConfig {
  readonly operatorUrl: string;
  readonly l1RpcUrl: string | undefined;
  readonly requestTimeout: number;
  readonly retries: number;
  readonly retryBaseDelay: number;
  readonly retryMaxDelay: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly polling: PollSchedule;
  readonly l1SignaturePolicy: L1SignaturePolicy;
  readonly feeToleranceBps: number;
  readonly priorityConfirmation: ConfirmationLevel;
  readonly mainContract: Address | undefined;
  readonly trackedTransactions: number;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly random: () => number;
}

function nonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError({
      code: 'INVALID_CONFIG',
      message: `${field} must be a non-negative number, got ${value}`,
      details: { field, value },
    });
  }
  return value;
}

function integerAtLeast(field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError({
      code: 'INVALID_CONFIG',
      message: `${field} must be an integer of at least ${min}, got ${value}`,
      details: { field, value },
    });
  }
  return value;
}

/**
 * Fill defaults and validate
 */
export function resolveConfig(config: RollupClientConfig): ResolvedConfig {
  const preset = config.network !== undefined ? NETWORKS[config.network] : undefined;
  const operatorUrl = config.operatorUrl ?? preset?.operatorUrl;
  if (operatorUrl === undefined) {
    throw new ValidationError({
      code: 'INVALID_CONFIG',
      message: 'No operator endpoint configured',
      suggestion: 'Set operatorUrl or a network preset',
    });
  }

  const mainContract = config.mainContract;
  if (mainContract !== undefined && !isAddress(mainContract)) {
    throw new ValidationError({
      code: 'INVALID_CONFIG',
      message: `mainContract is not an address: ${mainContract}`,
      details: { field: 'mainContract' },
    });
  }

  const polling: PollSchedule = { ...DEFAULT_POLL_SCHEDULE, ...config.polling };
  nonNegative('polling.pollInterval', polling.pollInterval);
  nonNegative('polling.maxPollInterval', polling.maxPollInterval);
  nonNegative('polling.maxWait', polling.maxWait);
  if (polling.backoffMultiplier < 1) {
    throw new ValidationError({
      code: 'INVALID_CONFIG',
      message: `polling.backoffMultiplier must be at least 1, got ${polling.backoffMultiplier}`,
      details: { field: 'polling.backoffMultiplier' },
    });
  }

  return {
    operatorUrl,
    l1RpcUrl: config.l1RpcUrl ?? preset?.l1RpcUrl,
    requestTimeout: nonNegative('requestTimeout', config.requestTimeout ?? 30_000),
    retries: nonNegative('retries', config.retries ?? 3),
    retryBaseDelay: nonNegative('retryBaseDelay', config.retryBaseDelay ?? 500),
    retryMaxDelay: nonNegative('retryMaxDelay', config.retryMaxDelay ?? 10_000),
    headers: { ...config.headers },
    polling,
    l1SignaturePolicy: config.l1SignaturePolicy ?? 'change-pubkey-only',
    feeToleranceBps: integerAtLeast('feeToleranceBps', config.feeToleranceBps ?? 0, 0),
    priorityConfirmation: config.priorityConfirmation ?? 'committed',
    mainContract,
    trackedTransactions: integerAtLeast('trackedTransactions', config.trackedTransactions ?? 1000, 1),
    logger: config.logger ?? noopLogger,
    clock: config.clock ?? systemClock,
    random: config.random ?? Math.random,
  };
}
