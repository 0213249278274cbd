/**
 * Dual signer
 *
 * Every transaction is signed by the rollup key over its canonical encoding.
 * When the L1 signature policy asks for it, the base-chain key additionally
 * signs a human-readable message (see messages.ts). Signing never touches the network.
 */

import type { Address, Hex, PubKeyHash } from '../core/types.js';
import { bytesToHex, hexToBytes } from '../core/hex.js';
import { privateKeyToAddress, serializeSignature, signMessage } from '../core/signature.js';
import type { SecureKey } from '../core/secure-key.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import { SigningError } from '../wallet/errors.js';
import type { RollupCrypto } from './crypto.js';
import { pubKeyHash, secp256k1RollupCrypto } from './crypto.js';
import { encodeOrder, encodeTransaction } from './encoding.js';
import type { TokenDisplayLookup } from './messages.js';
import { transactionMessage } from './messages.js';
import type { Order, RollupSignature, RollupTransaction, SignedOrder } from './transaction.js';
import { transactionSender } from './transaction.js';

/**
 * When a base-chain signature accompanies a transaction:
 * - `change-pubkey-only`: ECDSA ChangePubKey only
 * - `unregistered-account`: additionally every transaction from an account without a key hash
 * - `always`: every transaction
 */
export type L1SignaturePolicy = 'change-pubkey-only' | 'unregistered-account' | 'always';

export interface L1Signature {
  readonly type: 'EthereumSignature';
  readonly signature: Hex;
}

export interface SignatureBundle {
  readonly rollup: RollupSignature;
  readonly l1?: L1Signature;
}

export interface SignOptions {
  rollupKey?: SecureKey;
  l1Key?: SecureKey;
  /** Whether the account already has a public-key hash; unknown counts as registered */
  accountRegistered?: boolean;
  /** Force an L1 signature for this call */
  requireL1Signature?: boolean;
}

export interface DualSignerConfig {
  crypto?: RollupCrypto;
  policy?: L1SignaturePolicy;
  tokens?: TokenDisplayLookup;
  logger?: Logger;
}

export class DualSigner {
  readonly policy: L1SignaturePolicy;
  private readonly crypto: RollupCrypto;
  private readonly tokens: TokenDisplayLookup;
  private readonly logger: Logger;

  constructor(config: DualSignerConfig = {}) {
    this.crypto = config.crypto ?? secp256k1RollupCrypto;
    this.policy = config.policy ?? 'change-pubkey-only';
    this.tokens = config.tokens ?? (() => undefined);
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'signer');
  }

  /**
   * Whether `tx` needs a base-chain signature under the current policy
   */
  requiresL1Signature(tx: RollupTransaction, options: Pick<SignOptions, 'accountRegistered' | 'requireL1Signature'> = {}): boolean {
    if (tx.type === 'ChangePubKey') {
      // Onchain authorisation happens through a contract call instead
      return tx.ethAuthType === 'ECDSA';
    }
    if (options.requireL1Signature === true) return true;
    if (this.policy === 'always') return true;
    return this.policy === 'unregistered-account' && options.accountRegistered === false;
  }

  sign(tx: RollupTransaction, options: SignOptions): SignatureBundle {
    const rollupKey = this.assertKey(options.rollupKey, 'rollup');
    const publicKey = this.guard('rollup public key derivation', () => this.crypto.publicKey(rollupKey));

    if (tx.type === 'ChangePubKey') {
      const derived = this.guard('public key hash derivation', () => pubKeyHash(this.crypto, publicKey));
      if (derived !== tx.newPkHash) {
        throw new SigningError('newPkHash does not match the rollup key', { expected: derived, actual: tx.newPkHash });
      }
    }

    const signature = this.guard('rollup signing', () => this.crypto.sign(rollupKey, encodeTransaction(tx)));
    const rollup: RollupSignature = { pubKey: bytesToHex(publicKey), signature: bytesToHex(signature) };

    if (!this.requiresL1Signature(tx, options)) {
      this.logger.debug('Signed transaction', { type: tx.type, nonce: tx.nonce, l1: false });
      return { rollup };
    }

    const l1Key = this.assertKey(options.l1Key, 'base-chain');
    const sender = transactionSender(tx);
    const signer = this.guard('base-chain address derivation', () => l1Key.use((hex) => privateKeyToAddress(hex)));
    if (sender !== null && signer.toLowerCase() !== sender.toLowerCase()) {
      throw new SigningError('base-chain key does not control the transaction account', { signer, account: sender });
    }

    const message = transactionMessage(tx, this.tokens);
    const l1Signature = this.guard('base-chain signing', () =>
      l1Key.use((hex) => serializeSignature(signMessage(message, hex)))
    );

    this.logger.debug('Signed transaction', { type: tx.type, nonce: tx.nonce, l1: true });
    return { rollup, l1: { type: 'EthereumSignature', signature: l1Signature } };
  }

  /**
   * Sign one side of a Swap with its owner's rollup key
   */
  signOrder(order: Order, rollupKey: SecureKey | undefined): SignedOrder {
    const key = this.assertKey(rollupKey, 'rollup');
    const publicKey = this.guard('rollup public key derivation', () => this.crypto.publicKey(key));
    const signature = this.guard('order signing', () => this.crypto.sign(key, encodeOrder(order)));
    return { ...order, signature: { pubKey: bytesToHex(publicKey), signature: bytesToHex(signature) } };
  }

  /**
   * Check the rollup signature of a transaction against its embedded public key
   */
  verify(tx: RollupTransaction, rollup: RollupSignature): boolean {
    return this.crypto.verify(hexToBytes(rollup.pubKey), encodeTransaction(tx), hexToBytes(rollup.signature));
  }

  verifyOrder(order: SignedOrder): boolean {
    return this.crypto.verify(
      hexToBytes(order.signature.pubKey),
      encodeOrder(order),
      hexToBytes(order.signature.signature)
    );
  }

  /**
   * Key hash a ChangePubKey registers for `rollupKey`
   */
  pubKeyHash(rollupKey: SecureKey | undefined): PubKeyHash {
    const key = this.assertKey(rollupKey, 'rollup');
    return this.guard('public key hash derivation', () => pubKeyHash(this.crypto, this.crypto.publicKey(key)));
  }

  /**
   * Address of the base-chain key
   */
  static l1Address(l1Key: SecureKey): Address {
    return l1Key.use((hex) => privateKeyToAddress(hex));
  }

  private assertKey(key: SecureKey | undefined, which: string): SecureKey {
    if (key === undefined) {
      throw new SigningError(`${which} key is missing`);
    }
    if (key.isDisposed) {
      throw new SigningError(`${which} key has been disposed`);
    }
    return key;
  }

  private guard<T>(step: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SigningError) throw error;
      throw new SigningError(`${step} failed`, { cause: error instanceof Error ? error.message : String(error) });
    }
  }
}
