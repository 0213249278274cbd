/**
 * Fee estimation
 *
 * The operator prices every transaction; estimates are advisory and re-checked
 * at submission. A suggested fee is the estimate plus tolerance, rounded up to
 * the nearest packable fee, and never above the caller's maximum.
 */

import type { Address } from '../core/types.js';
import { addBasisPoints } from '../core/units.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import { FeeTooHighError, FeeUnavailableError, RejectedError } from '../wallet/errors.js';
import { FEE_FORMAT, closestGreaterOrEqPackable } from './packing.js';
import type { TokenLike } from './tokens.js';

export type FeeTxType =
  | 'Transfer'
  | 'Withdraw'
  | 'FastWithdraw'
  | 'ChangePubKey'
  | 'ChangePubKeyOnchain'
  | 'ForcedExit'
  | 'MintNFT'
  | 'WithdrawNFT'
  | 'FastWithdrawNFT'
  | 'Swap';

export interface FeeEstimate {
  readonly txType: FeeTxType;
  readonly token: TokenLike;
  readonly gasTxAmount: bigint;
  readonly gasPriceWei: bigint;
  readonly gasFee: bigint;
  readonly zkpFee: bigint;
  readonly totalFee: bigint;
}

export interface FeeSource {
  estimateFee(txType: FeeTxType, address: Address, token: TokenLike, options?: { signal?: AbortSignal }): Promise<FeeEstimate>;
}

export interface FeeSuggestion {
  /** Packable fee to put into the transaction */
  readonly fee: bigint;
  readonly estimate: FeeEstimate;
}

export interface SuggestOptions {
  maxFee?: bigint;
  toleranceBps?: number;
  signal?: AbortSignal;
}

export interface FeeEstimatorConfig {
  source: FeeSource;
  /** Default tolerance added on top of the estimate, in basis points */
  toleranceBps?: number;
  logger?: Logger;
}

export class FeeEstimator {
  private readonly source: FeeSource;
  private readonly toleranceBps: number;
  private readonly logger: Logger;

  constructor(config: FeeEstimatorConfig) {
    this.source = config.source;
    this.toleranceBps = config.toleranceBps ?? 0;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'fees');
  }

  /**
   * Operator estimate; a rejection means the pair cannot be priced
   */
  async estimate(txType: FeeTxType, token: TokenLike, address: Address, options: { signal?: AbortSignal } = {}): Promise<FeeEstimate> {
    try {
      return await this.source.estimateFee(txType, address, token, options);
    } catch (error) {
      if (error instanceof RejectedError) {
        throw new FeeUnavailableError(txType, String(token), error.message);
      }
      throw error;
    }
  }

  async suggest(txType: FeeTxType, token: TokenLike, address: Address, options: SuggestOptions = {}): Promise<FeeSuggestion> {
    const estimate = await this.estimate(txType, token, address, options.signal ? { signal: options.signal } : {});
    const bps = options.toleranceBps ?? this.toleranceBps;
    const fee = closestGreaterOrEqPackable(addBasisPoints(estimate.totalFee, bps), FEE_FORMAT);

    if (options.maxFee !== undefined) {
      this.assertWithinMax(fee, options.maxFee, token);
    }

    this.logger.debug('Suggested fee', { txType, token, totalFee: estimate.totalFee.toString(), fee: fee.toString(), bps });
    return { fee, estimate };
  }

  /**
   * Fail fast before signing when a fee exceeds the caller's ceiling
   */
  assertWithinMax(fee: bigint, maxFee: bigint, token: TokenLike = ''): void {
    if (fee > maxFee) {
      throw new FeeTooHighError(fee, maxFee, String(token));
    }
  }
}
