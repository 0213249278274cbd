/**
 * RollupWallet - acts for one account on the rollup
 *
 * Builds, signs and submits rollup transactions, then tracks them to finality.
 * Every operation has a throwing form and a `safe*` form returning a Result.
 *
 * ```typescript
 * const wallet = RollupWallet.create({
 *   config: { network: 'localhost' },
 *   l1Key: SecureKey.fromHex(process.env.L1_KEY),
 *   rollupKey: SecureKey.fromHex(process.env.ROLLUP_KEY),
 * });
 *
 * const { txHash } = await wallet.transfer({ to: '0x...', token: 'ETH', amount: '1.0' });
 * const state = await wallet.waitForTransaction(txHash, 'verified');
 * ```
 */

import type { Address, Hash, TokenInfo, TxHash } from '../core/types.js';
import { isAddress } from '../core/address.js';
import { isHash } from '../core/hex.js';
import { parseUnits } from '../core/units.js';
import { LRUCache } from '../core/cache.js';
import type { SecureKey } from '../core/secure-key.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { fromPromise } from '../core/result.js';
import type { RollupCrypto } from '../protocol/crypto.js';
import { secp256k1RollupCrypto } from '../protocol/crypto.js';
import type { AccountState, OperatorApi } from '../protocol/rpc.js';
import { OperatorClient } from '../protocol/rpc.js';
import type { ReceiptSource } from '../protocol/ethereum.js';
import { EthereumClient } from '../protocol/ethereum.js';
import type { TokenLike } from '../protocol/tokens.js';
import { TokenRegistry } from '../protocol/tokens.js';
import type { SignatureBundle } from '../protocol/signer.js';
import { DualSigner } from '../protocol/signer.js';
import { NonceTracker } from '../protocol/nonce.js';
import type { FeeEstimate, FeeTxType } from '../protocol/fees.js';
import { FeeEstimator } from '../protocol/fees.js';
import type { ConfirmationState, TargetStage, WaitOptions } from '../protocol/confirmation.js';
import { TransactionTracker } from '../protocol/confirmation.js';
import type {
  PriorityOperationSubmitter,
  PriorityRequest,
  PriorityResult,
  PriorityWaitOptions,
} from '../protocol/priority.js';
import { PriorityOperationTracker } from '../protocol/priority.js';
import type {
  BuiltTransaction,
  ChangePubKey,
  EthAuthType,
  ForcedExit,
  MintNFT,
  RollupTransaction,
  SignedOrder,
  Swap,
  Transfer,
  Withdraw,
  WithdrawNFT,
} from '../protocol/transaction.js';
import {
  buildChangePubKey,
  buildForcedExit,
  buildMintNFT,
  buildOrder,
  buildSwap,
  buildTransfer,
  buildWithdraw,
  buildWithdrawNFT,
} from '../protocol/transaction.js';
import type { RollupClientConfig, ResolvedConfig } from './config.js';
import { resolveConfig } from './config.js';
import type { PrecisionLoss, RollupError } from './errors.js';
import { InvalidAddressError, InvalidAmountError, PrecisionLossError, ValidationError, toRollupError } from './errors.js';

export interface RollupWalletOptions {
  config: RollupClientConfig;
  /** Base-chain key that owns the account */
  l1Key: SecureKey;
  /** Rollup signing key; needed for every L2 transaction */
  rollupKey?: SecureKey;
  crypto?: RollupCrypto;
  /** Replaces the JSON-RPC operator client */
  operator?: OperatorApi;
  /** Replaces the L1 client built from `l1RpcUrl` */
  ethereum?: ReceiptSource;
  /** Sends deposits and full exits to L1 */
  submitter?: PriorityOperationSubmitter;
  /** Tokens known up front; otherwise loaded from the operator */
  tokens?: readonly TokenInfo[];
  fetch?: typeof fetch;
}

/** Decimal string in token units, or raw base units */
export type AmountInput = string | bigint;

export interface TransactionOptions {
  /** Fee in base units; estimated when omitted */
  fee?: bigint;
  maxFee?: bigint;
  validFrom?: number | bigint;
  validUntil?: number | bigint;
  /** Accept amounts rounded down to the packed format */
  allowPrecisionLoss?: boolean;
  requireL1Signature?: boolean;
  signal?: AbortSignal;
}

export interface TransferOptions extends TransactionOptions {
  to: string;
  token: TokenLike;
  amount: AmountInput;
}

export interface WithdrawOptions extends TransactionOptions {
  /** Base-chain recipient; defaults to the wallet address */
  to?: string;
  token: TokenLike;
  amount: AmountInput;
  feeToken?: TokenLike;
  fastProcessing?: boolean;
}

export interface SetSigningKeyOptions extends TransactionOptions {
  feeToken: TokenLike;
  ethAuthType?: EthAuthType;
}

export interface ForcedExitOptions extends TransactionOptions {
  target: string;
  token: TokenLike;
}

export interface MintNFTOptions extends TransactionOptions {
  recipient?: string;
  contentHash: string;
  feeToken: TokenLike;
}

export interface WithdrawNFTOptions extends TransactionOptions {
  to?: string;
  /** NFT token id */
  token: number;
  feeToken: TokenLike;
  fastProcessing?: boolean;
}

export interface SignOrderOptions {
  tokenSell: TokenLike;
  tokenBuy: TokenLike;
  /** Amount of `tokenSell` offered */
  amount: AmountInput;
  /** [sell, buy] exchange ratio in base units */
  ratio: readonly [bigint, bigint];
  recipient?: string;
  validFrom?: number | bigint;
  validUntil?: number | bigint;
  allowPrecisionLoss?: boolean;
}

export interface SwapOptions extends TransactionOptions {
  orders: readonly [SignedOrder, SignedOrder];
  /** Amounts to fill; default to the orders' full amounts */
  amounts?: readonly [bigint, bigint];
  feeToken: TokenLike;
}

export interface DepositOptions {
  /** Rollup recipient; defaults to the wallet address */
  to?: string;
  token: TokenLike;
  amount: AmountInput;
}

export interface FullExitOptions {
  token: TokenLike;
}

export interface SubmittedTransaction<T extends RollupTransaction = RollupTransaction> {
  readonly txHash: TxHash;
  readonly tx: T;
  readonly signatures: SignatureBundle;
  readonly precisionLoss: readonly PrecisionLoss[];
}

export interface SubmittedPriorityOperation {
  readonly l1TxHash: Hash;
  readonly request: PriorityRequest;
}

interface SubmitPlan<T extends RollupTransaction> {
  feeType: FeeTxType;
  feeToken: TokenInfo;
  options: TransactionOptions;
  /** Asks the operator for fast processing, priced through feeType */
  fastProcessing?: boolean;
  build: (context: { nonce: number; accountId: number; fee: bigint }) => BuiltTransaction<T>;
}

export class RollupWallet {
  readonly address: Address;
  readonly config: ResolvedConfig;
  readonly tokens: TokenRegistry;

  private readonly l1Key: SecureKey;
  private readonly rollupKey: SecureKey | undefined;
  private readonly crypto: RollupCrypto;
  private readonly operator: OperatorApi;
  private readonly ethereum: ReceiptSource | undefined;
  private readonly submitter: PriorityOperationSubmitter | undefined;
  private readonly signer: DualSigner;
  private readonly nonces: NonceTracker;
  private readonly fees: FeeEstimator;
  private readonly trackers: LRUCache<TxHash, TransactionTracker>;
  private readonly logger: Logger;

  private constructor(options: RollupWalletOptions, config: ResolvedConfig) {
    this.config = config;
    this.l1Key = options.l1Key;
    this.rollupKey = options.rollupKey;
    this.address = DualSigner.l1Address(options.l1Key);
    this.crypto = options.crypto ?? secp256k1RollupCrypto;
    this.logger = createPrefixedLogger(config.logger, 'wallet');

    const transport = {
      timeout: config.requestTimeout,
      retries: config.retries,
      retryBaseDelay: config.retryBaseDelay,
      retryMaxDelay: config.retryMaxDelay,
      headers: { ...config.headers },
      clock: config.clock,
      random: config.random,
      logger: config.logger,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    };

    this.operator = options.operator ?? new OperatorClient({ url: config.operatorUrl, ...transport });
    this.ethereum =
      options.ethereum ??
      (config.l1RpcUrl !== undefined ? new EthereumClient({ url: config.l1RpcUrl, ...transport }) : undefined);
    this.submitter = options.submitter;

    this.tokens = new TokenRegistry(this.operator);
    if (options.tokens !== undefined) this.tokens.register(options.tokens);

    this.signer = new DualSigner({
      crypto: this.crypto,
      policy: config.l1SignaturePolicy,
      tokens: (id) => this.tokens.find(id),
      logger: config.logger,
    });
    this.nonces = new NonceTracker({ source: this.operator, logger: config.logger });
    this.fees = new FeeEstimator({ source: this.operator, toleranceBps: config.feeToleranceBps, logger: config.logger });
    this.trackers = new LRUCache<TxHash, TransactionTracker>({ maxSize: config.trackedTransactions, clock: config.clock });
  }

  static create(options: RollupWalletOptions): RollupWallet {
    return new RollupWallet(options, resolveConfig(options.config));
  }

  // ============ Transactions ============

  async transfer(options: TransferOptions): Promise<SubmittedTransaction<Transfer>> {
    const token = await this.tokens.resolve(options.token);
    const amount = this.toUnits(options.amount, token);
    const to = this.toAddress(options.to, 'to');

    return this.submit({
      feeType: 'Transfer',
      feeToken: token,
      options,
      build: ({ nonce, accountId, fee }) =>
        buildTransfer({
          accountId,
          from: this.address,
          to,
          token: token.id,
          amount,
          fee,
          nonce,
          ...this.validity(options),
        }),
    });
  }

  async withdraw(options: WithdrawOptions): Promise<SubmittedTransaction<Withdraw>> {
    const token = await this.tokens.resolve(options.token);
    const feeToken = options.feeToken !== undefined ? await this.tokens.resolve(options.feeToken) : token;
    const amount = this.toUnits(options.amount, token);
    const to = this.toAddress(options.to ?? this.address, 'to');
    const fastProcessing = options.fastProcessing ?? false;

    return this.submit({
      feeType: fastProcessing ? 'FastWithdraw' : 'Withdraw',
      feeToken,
      options,
      fastProcessing,
      build: ({ nonce, accountId, fee }) =>
        buildWithdraw({
          accountId,
          from: this.address,
          to,
          token: token.id,
          feeToken: feeToken.id,
          amount,
          fee,
          nonce,
          fastProcessing,
          ...this.validity(options),
        }),
    });
  }

  /**
   * Register the rollup key for this account (ChangePubKey)
   */
  async setSigningKey(options: SetSigningKeyOptions): Promise<SubmittedTransaction<ChangePubKey>> {
    const rollupKey = this.rollupKey;
    if (rollupKey === undefined) {
      throw new ValidationError({
        code: 'NO_ROLLUP_KEY',
        message: 'Wallet was created without a rollup key',
        suggestion: 'Pass rollupKey to RollupWallet.create',
      });
    }
    const newPkHash = this.signer.pubKeyHash(rollupKey);
    const account = await this.nonces.getAccount(this.address);
    if (account.pubKeyHash === newPkHash) {
      throw new ValidationError({
        code: 'SIGNING_KEY_ALREADY_SET',
        message: `Signing key ${newPkHash} is already registered`,
        details: { address: this.address, pubKeyHash: newPkHash },
      });
    }

    const feeToken = await this.tokens.resolve(options.feeToken);
    const ethAuthType = options.ethAuthType ?? 'ECDSA';

    const submitted = await this.submit({
      feeType: ethAuthType === 'Onchain' ? 'ChangePubKeyOnchain' : 'ChangePubKey',
      feeToken,
      options,
      build: ({ nonce, accountId, fee }) =>
        buildChangePubKey({
          accountId,
          account: this.address,
          newPkHash,
          feeToken: feeToken.id,
          fee,
          nonce,
          ethAuthType,
          ...this.validity(options),
        }),
    });
    this.nonces.recordPubKeyHash(this.address, newPkHash);
    return submitted;
  }

  async forcedExit(options: ForcedExitOptions): Promise<SubmittedTransaction<ForcedExit>> {
    const token = await this.tokens.resolve(options.token);
    const target = this.toAddress(options.target, 'target');

    return this.submit({
      feeType: 'ForcedExit',
      feeToken: token,
      options,
      build: ({ nonce, accountId, fee }) =>
        buildForcedExit({
          initiatorAccountId: accountId,
          target,
          token: token.id,
          fee,
          nonce,
          ...this.validity(options),
        }),
    });
  }

  async mintNFT(options: MintNFTOptions): Promise<SubmittedTransaction<MintNFT>> {
    const feeToken = await this.tokens.resolve(options.feeToken);
    const recipient = this.toAddress(options.recipient ?? this.address, 'recipient');

    return this.submit({
      feeType: 'MintNFT',
      feeToken,
      options,
      build: ({ nonce, accountId, fee }) =>
        buildMintNFT({
          creatorId: accountId,
          creatorAddress: this.address,
          contentHash: options.contentHash,
          recipient,
          feeToken: feeToken.id,
          fee,
          nonce,
        }),
    });
  }

  async withdrawNFT(options: WithdrawNFTOptions): Promise<SubmittedTransaction<WithdrawNFT>> {
    const feeToken = await this.tokens.resolve(options.feeToken);
    const to = this.toAddress(options.to ?? this.address, 'to');
    const fastProcessing = options.fastProcessing ?? false;

    return this.submit({
      feeType: fastProcessing ? 'FastWithdrawNFT' : 'WithdrawNFT',
      feeToken,
      options,
      fastProcessing,
      build: ({ nonce, accountId, fee }) =>
        buildWithdrawNFT({
          accountId,
          from: this.address,
          to,
          token: options.token,
          feeToken: feeToken.id,
          fee,
          nonce,
          ...this.validity(options),
        }),
    });
  }

  /**
   * Sign one side of a Swap. Orders carry the account's current nonce and do
   * not consume it; the Swap that fills them does.
   */
  async signOrder(options: SignOrderOptions): Promise<SignedOrder> {
    const tokenSell = await this.tokens.resolve(options.tokenSell);
    const tokenBuy = await this.tokens.resolve(options.tokenBuy);
    const amount = this.toUnits(options.amount, tokenSell);
    const recipient = this.toAddress(options.recipient ?? this.address, 'recipient');
    const account = await this.nonces.getAccount(this.address);
    const accountId = this.requireAccountId(account.id);

    const built = buildOrder({
      accountId,
      recipient,
      nonce: account.nonce,
      tokenSell: tokenSell.id,
      tokenBuy: tokenBuy.id,
      ratio: options.ratio,
      amount,
      ...this.validity(options),
    });
    this.checkPrecision(built.precisionLoss, options.allowPrecisionLoss);
    return this.signer.signOrder(built.tx, this.rollupKey);
  }

  async swap(options: SwapOptions): Promise<SubmittedTransaction<Swap>> {
    const feeToken = await this.tokens.resolve(options.feeToken);
    const [first, second] = options.orders;
    const amounts: readonly [bigint, bigint] = options.amounts ?? [first.amount, second.amount];

    return this.submit({
      feeType: 'Swap',
      feeToken,
      options,
      build: ({ nonce, accountId, fee }) =>
        buildSwap({
          submitterId: accountId,
          submitterAddress: this.address,
          nonce,
          orders: options.orders,
          amounts,
          feeToken: feeToken.id,
          fee,
        }),
    });
  }

  // ============ Priority operations ============

  async deposit(options: DepositOptions): Promise<SubmittedPriorityOperation> {
    const token = await this.tokens.resolve(options.token);
    const amount = this.toUnits(options.amount, token);
    const to = this.toAddress(options.to ?? this.address, 'to');
    return this.submitPriority({ type: 'Deposit', from: this.address, to, token, amount });
  }

  /**
   * Withdraw everything in `token` through L1, bypassing the operator
   */
  async fullExit(options: FullExitOptions): Promise<SubmittedPriorityOperation> {
    const token = await this.tokens.resolve(options.token);
    const account = await this.nonces.getAccount(this.address);
    const accountId = this.requireAccountId(account.id);
    return this.submitPriority({ type: 'FullExit', accountId, address: this.address, token });
  }

  /**
   * Track a priority operation by its L1 transaction hash, or resume by serial id
   */
  async waitForPriorityOperation(ref: Hash | bigint, options: PriorityWaitOptions = {}): Promise<PriorityResult> {
    const tracker = new PriorityOperationTracker({
      receipts: this.ethereum ?? unavailableReceipts,
      operator: this.operator,
      clock: this.config.clock,
      logger: this.config.logger,
      polling: this.config.polling,
      ...(this.config.mainContract !== undefined ? { mainContract: this.config.mainContract } : {}),
      confirmation: this.config.priorityConfirmation,
    });

    if (typeof ref === 'bigint') {
      return tracker.resume(ref, options);
    }
    if (this.ethereum === undefined) {
      throw new ValidationError({
        code: 'L1_NOT_CONFIGURED',
        message: 'Tracking by L1 transaction hash needs an L1 endpoint',
        suggestion: 'Set l1RpcUrl or pass an ethereum client, or resume by serial id',
      });
    }
    return tracker.track(ref, options);
  }

  // ============ Confirmation ============

  /**
   * Wait until a submitted transaction reaches `target` or fails
   */
  async waitForTransaction(
    txHash: TxHash,
    target: TargetStage = 'executed',
    options: WaitOptions = {}
  ): Promise<ConfirmationState> {
    return this.tracker(txHash).waitFor(target, options);
  }

  /**
   * Last known state of a transaction submitted or tracked by this wallet
   */
  getTransactionState(txHash: TxHash): ConfirmationState | undefined {
    return this.trackers.get(txHash)?.state;
  }

  // ============ Account ============

  async getAccountState(address: string = this.address): Promise<AccountState> {
    return this.operator.getAccountState(this.toAddress(address, 'address'));
  }

  async getNonce(): Promise<number> {
    return this.nonces.getCurrentNonce(this.address);
  }

  /**
   * Committed balance in base units; `verified` reads the proven state
   */
  async getBalance(token: TokenLike, options: { verified?: boolean } = {}): Promise<bigint> {
    const info = await this.tokens.resolve(token);
    const state = await this.getAccountState();
    const balances = options.verified === true ? state.verified.balances : state.balances;
    return balances[info.symbol] ?? 0n;
  }

  async estimateFee(txType: FeeTxType, token: TokenLike): Promise<FeeEstimate> {
    const info = await this.tokens.resolve(token);
    return this.fees.estimate(txType, info.symbol, this.address);
  }

  // ============ Safe variants ============

  async safeTransfer(options: TransferOptions): Promise<Result<SubmittedTransaction<Transfer>, RollupError>> {
    return fromPromise(this.transfer(options), toRollupError);
  }

  async safeWithdraw(options: WithdrawOptions): Promise<Result<SubmittedTransaction<Withdraw>, RollupError>> {
    return fromPromise(this.withdraw(options), toRollupError);
  }

  async safeSetSigningKey(options: SetSigningKeyOptions): Promise<Result<SubmittedTransaction<ChangePubKey>, RollupError>> {
    return fromPromise(this.setSigningKey(options), toRollupError);
  }

  async safeForcedExit(options: ForcedExitOptions): Promise<Result<SubmittedTransaction<ForcedExit>, RollupError>> {
    return fromPromise(this.forcedExit(options), toRollupError);
  }

  async safeMintNFT(options: MintNFTOptions): Promise<Result<SubmittedTransaction<MintNFT>, RollupError>> {
    return fromPromise(this.mintNFT(options), toRollupError);
  }

  async safeWithdrawNFT(options: WithdrawNFTOptions): Promise<Result<SubmittedTransaction<WithdrawNFT>, RollupError>> {
    return fromPromise(this.withdrawNFT(options), toRollupError);
  }

  async safeSignOrder(options: SignOrderOptions): Promise<Result<SignedOrder, RollupError>> {
    return fromPromise(this.signOrder(options), toRollupError);
  }

  async safeSwap(options: SwapOptions): Promise<Result<SubmittedTransaction<Swap>, RollupError>> {
    return fromPromise(this.swap(options), toRollupError);
  }

  async safeDeposit(options: DepositOptions): Promise<Result<SubmittedPriorityOperation, RollupError>> {
    return fromPromise(this.deposit(options), toRollupError);
  }

  async safeFullExit(options: FullExitOptions): Promise<Result<SubmittedPriorityOperation, RollupError>> {
    return fromPromise(this.fullExit(options), toRollupError);
  }

  async safeWaitForTransaction(
    txHash: TxHash,
    target: TargetStage = 'executed',
    options: WaitOptions = {}
  ): Promise<Result<ConfirmationState, RollupError>> {
    return fromPromise(this.waitForTransaction(txHash, target, options), toRollupError);
  }

  async safeWaitForPriorityOperation(
    ref: Hash | bigint,
    options: PriorityWaitOptions = {}
  ): Promise<Result<PriorityResult, RollupError>> {
    return fromPromise(this.waitForPriorityOperation(ref, options), toRollupError);
  }

  async safeGetAccountState(address?: string): Promise<Result<AccountState, RollupError>> {
    return fromPromise(this.getAccountState(address), toRollupError);
  }

  async safeGetNonce(): Promise<Result<number, RollupError>> {
    return fromPromise(this.getNonce(), toRollupError);
  }

  async safeGetBalance(token: TokenLike, options: { verified?: boolean } = {}): Promise<Result<bigint, RollupError>> {
    return fromPromise(this.getBalance(token, options), toRollupError);
  }

  async safeEstimateFee(txType: FeeTxType, token: TokenLike): Promise<Result<FeeEstimate, RollupError>> {
    return fromPromise(this.estimateFee(txType, token), toRollupError);
  }

  // ============ Internals ============

  /**
   * nonce -> fee -> build -> sign -> submit, inside the account's nonce lock
   */
  private async submit<T extends RollupTransaction>(plan: SubmitPlan<T>): Promise<SubmittedTransaction<T>> {
    const { options } = plan;
    const signal = options.signal;

    const submitted = await this.nonces.withNonce(this.address, async ({ nonce, account }) => {
      const accountId = this.requireAccountId(account.id);

      let fee: bigint;
      if (options.fee !== undefined) {
        if (options.maxFee !== undefined) {
          this.fees.assertWithinMax(options.fee, options.maxFee, plan.feeToken.symbol);
        }
        fee = options.fee;
      } else {
        const suggestion = await this.fees.suggest(plan.feeType, plan.feeToken.symbol, this.address, {
          ...(options.maxFee !== undefined ? { maxFee: options.maxFee } : {}),
          ...(signal ? { signal } : {}),
        });
        fee = suggestion.fee;
      }

      const built = plan.build({ nonce, accountId, fee });
      this.checkPrecision(built.precisionLoss, options.allowPrecisionLoss);

      const signatures = this.signer.sign(built.tx, {
        ...(this.rollupKey ? { rollupKey: this.rollupKey } : {}),
        l1Key: this.l1Key,
        accountRegistered: account.pubKeyHash !== null,
        ...(options.requireL1Signature !== undefined ? { requireL1Signature: options.requireL1Signature } : {}),
      });

      const txHash = await this.operator.submitTransaction(built.tx, signatures, {
        ...(signal ? { signal } : {}),
        ...(plan.fastProcessing === true ? { fastProcessing: true } : {}),
      });
      return { txHash, tx: built.tx, signatures, precisionLoss: built.precisionLoss };
    });

    this.trackers.set(
      submitted.txHash,
      new TransactionTracker({
        txHash: submitted.txHash,
        source: this.operator,
        clock: this.config.clock,
        logger: this.config.logger,
        polling: this.config.polling,
      })
    );
    this.logger.info('Submitted transaction', {
      type: submitted.tx.type,
      txHash: submitted.txHash,
      nonce: submitted.tx.nonce,
    });
    return submitted;
  }

  private async submitPriority(request: PriorityRequest): Promise<SubmittedPriorityOperation> {
    if (this.submitter === undefined) {
      throw new ValidationError({
        code: 'NO_L1_SUBMITTER',
        message: `${request.type} needs an L1 submitter`,
        suggestion: 'Pass a PriorityOperationSubmitter as `submitter` to RollupWallet.create',
      });
    }
    const l1TxHash = await this.submitter.submit(request);
    if (!isHash(l1TxHash)) {
      throw new ValidationError({
        code: 'INVALID_L1_TX_HASH',
        message: `L1 submitter returned an invalid transaction hash: ${String(l1TxHash)}`,
      });
    }
    this.logger.info('Submitted priority request', { type: request.type, l1TxHash });
    return { l1TxHash, request };
  }

  private tracker(txHash: TxHash): TransactionTracker {
    let tracker = this.trackers.get(txHash);
    if (tracker === undefined) {
      tracker = new TransactionTracker({
        txHash,
        source: this.operator,
        clock: this.config.clock,
        logger: this.config.logger,
        polling: this.config.polling,
      });
      this.trackers.set(txHash, tracker);
    }
    return tracker;
  }

  private requireAccountId(id: number | null): number {
    if (id === null) {
      throw new ValidationError({
        code: 'ACCOUNT_NOT_FOUND',
        message: `Account ${this.address} has no rollup account id yet`,
        details: { address: this.address },
        suggestion: 'Deposit funds to the account first',
      });
    }
    return id;
  }

  private checkPrecision(losses: readonly PrecisionLoss[], allow: boolean | undefined): void {
    if (losses.length > 0 && allow !== true) {
      throw new PrecisionLossError(losses);
    }
  }

  private toUnits(amount: AmountInput, token: TokenInfo): bigint {
    let value: bigint;
    if (typeof amount === 'bigint') {
      value = amount;
    } else {
      try {
        value = parseUnits(amount, token.decimals);
      } catch (error) {
        throw new InvalidAmountError('amount', amount, error instanceof Error ? error.message : String(error));
      }
    }
    if (value < 0n) throw new InvalidAmountError('amount', amount, 'must not be negative');
    return value;
  }

  private toAddress(value: string, field: string): Address {
    if (!isAddress(value)) throw new InvalidAddressError(value, field);
    return value;
  }

  private validity(options: { validFrom?: number | bigint; validUntil?: number | bigint }): {
    validFrom?: number | bigint;
    validUntil?: number | bigint;
  } {
    return {
      ...(options.validFrom !== undefined ? { validFrom: options.validFrom } : {}),
      ...(options.validUntil !== undefined ? { validUntil: options.validUntil } : {}),
    };
  }
}

const unavailableReceipts: ReceiptSource = {
  getTransactionReceipt: () =>
    Promise.reject(
      new ValidationError({
        code: 'L1_NOT_CONFIGURED',
        message: 'No L1 endpoint configured',
        suggestion: 'Set l1RpcUrl or pass an ethereum client',
      })
    ),
};
