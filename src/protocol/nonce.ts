/**
 * Account/Nonce Tracker - Prevents nonce races between concurrent submissions
 *
 * The problem: Two submissions from one account that both read the nonce from
 * the operator get the same value, and one of them is rejected.
 *
 * The solution: Cache the nonce per account, hand it out inside a per-account
 * mutex, and only advance it once the operator accepted the transaction.
 * Any doubt about the cached value drops it; the next use reloads it.
 */

import type { Address, PubKeyHash } from '../core/types.js';
import { normalizeAddress } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import { RejectedError, RollupError } from '../wallet/errors.js';
import type { AccountState } from './rpc.js';

/**
 * Simple mutex for async operations
 * Ensures only one operation can hold the lock at a time
 */
export class AsyncMutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next !== undefined) {
      next();
    } else {
      this.locked = false;
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Execute a function while holding the lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

export interface AccountSource {
  getAccountState(address: Address, options?: { signal?: AbortSignal }): Promise<AccountState>;
}

/**
 * What the tracker knows about an account
 */
export interface TrackedAccount {
  readonly address: Address;
  readonly id: number | null;
  readonly pubKeyHash: PubKeyHash | null;
  readonly nonce: number;
}

export interface NonceContext {
  readonly nonce: number;
  readonly account: TrackedAccount;
}

export interface NonceTrackerConfig {
  source: AccountSource;
  logger?: Logger;
}

interface AccountEntry {
  readonly mutex: AsyncMutex;
  /** null = must reload before next use */
  account: TrackedAccount | null;
}

/**
 * Hands out nonces for any number of accounts
 *
 * Usage:
 * ```typescript
 * const nonces = new NonceTracker({ source: operator });
 *
 * // Nonce is advanced only when the callback resolves
 * const hash = await nonces.withNonce(address, async ({ nonce, account }) => {
 *   return operator.submitTransaction(build(nonce, account.id), signatures);
 * });
 * ```
 */
export class NonceTracker {
  private readonly source: AccountSource;
  private readonly logger: Logger;
  private readonly accounts = new Map<string, AccountEntry>();

  constructor(config: NonceTrackerConfig) {
    this.source = config.source;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'nonce');
  }

  /**
   * Nonce the next transaction would use, without reserving it
   */
  async getCurrentNonce(address: Address): Promise<number> {
    const entry = this.entry(address);
    return entry.mutex.withLock(async () => (await this.load(address, entry)).nonce);
  }

  /**
   * Reserve a nonce and advance immediately.
   * Prefer withNonce, which advances only after acceptance.
   */
  async getNextNonce(address: Address): Promise<number> {
    const entry = this.entry(address);
    return entry.mutex.withLock(async () => {
      const account = await this.load(address, entry);
      entry.account = { ...account, nonce: account.nonce + 1 };
      return account.nonce;
    });
  }

  /**
   * Run `fn` with the account's nonce while holding its lock.
   * Resolving advances the nonce; rejecting leaves it for the error policy.
   */
  async withNonce<T>(address: Address, fn: (context: NonceContext) => Promise<T>): Promise<T> {
    const entry = this.entry(address);
    return entry.mutex.withLock(async () => {
      const account = await this.load(address, entry);
      let result: T;
      try {
        result = await fn({ nonce: account.nonce, account });
      } catch (error) {
        await this.handleFailure(address, entry, error);
        throw error;
      }
      entry.account = { ...account, nonce: account.nonce + 1 };
      this.logger.debug('Nonce advanced', { address, nonce: account.nonce + 1 });
      return result;
    });
  }

  /**
   * Reload the account from the operator
   */
  async sync(address: Address): Promise<TrackedAccount> {
    const entry = this.entry(address);
    return entry.mutex.withLock(async () => {
      entry.account = null;
      return this.load(address, entry);
    });
  }

  /**
   * Apply the error policy to a submission that failed outside withNonce
   */
  async onSubmissionRejected(address: Address, error: unknown): Promise<void> {
    const entry = this.entry(address);
    await entry.mutex.withLock(() => this.handleFailure(address, entry, error));
  }

  async getAccount(address: Address): Promise<TrackedAccount> {
    const entry = this.entry(address);
    return entry.mutex.withLock(() => this.load(address, entry));
  }

  /**
   * Record a signing key the operator accepted, without a reload
   */
  recordPubKeyHash(address: Address, pubKeyHash: PubKeyHash): void {
    const entry = this.entry(address);
    if (entry.account !== null) {
      entry.account = { ...entry.account, pubKeyHash };
    }
  }

  /**
   * Drop the cached account; the next use reloads it
   */
  invalidate(address: Address): void {
    const entry = this.accounts.get(normalizeAddress(address));
    if (entry !== undefined) entry.account = null;
  }

  private entry(address: Address): AccountEntry {
    const key = normalizeAddress(address);
    let entry = this.accounts.get(key);
    if (entry === undefined) {
      entry = { mutex: new AsyncMutex(), account: null };
      this.accounts.set(key, entry);
    }
    return entry;
  }

  /**
   * Must be called while holding the entry's mutex
   */
  private async load(address: Address, entry: AccountEntry): Promise<TrackedAccount> {
    if (entry.account !== null) return entry.account;

    const state = await this.source.getAccountState(address);
    const account: TrackedAccount = {
      address: state.address,
      id: state.id,
      pubKeyHash: state.pubKeyHash,
      nonce: state.nonce,
    };
    entry.account = account;
    this.logger.debug('Synced account', { address, id: account.id, nonce: account.nonce });
    return account;
  }

  /**
   * Must be called while holding the entry's mutex
   */
  private async handleFailure(address: Address, entry: AccountEntry, error: unknown): Promise<void> {
    if (error instanceof RejectedError && error.reason === 'nonce_mismatch') {
      entry.account = null;
      try {
        const account = await this.load(address, entry);
        this.logger.info('Nonce resynced after mismatch', { address, nonce: account.nonce });
      } catch (syncError) {
        // Stays invalidated; the next use retries the load
        this.logger.warn('Resync after nonce mismatch failed', {
          address,
          error: syncError instanceof Error ? syncError.message : String(syncError),
        });
      }
      return;
    }

    if (isLocalFailure(error)) return;

    // The operator may have applied the nonce even though the call failed or was abandoned
    entry.account = null;
    this.logger.debug('Nonce invalidated', {
      address,
      code: error instanceof RollupError ? error.code : 'UNKNOWN_ERROR',
    });
  }
}

/**
 * Failures raised before anything reached the operator
 */
function isLocalFailure(error: unknown): boolean {
  return (
    error instanceof RollupError && (error.kind === 'validation' || error.kind === 'signing' || error.kind === 'fee')
  );
}
