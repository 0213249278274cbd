/**
 * Rollup crypto adapter
 *
 * The client never touches curve arithmetic directly: signing, verification and
 * hashing for the rollup key go through a RollupCrypto. The default adapter signs
 * sha256(message) with secp256k1 and produces 64-byte compact signatures.
 */

import type { PubKeyHash } from '../core/types.js';
import { secp256k1 } from '../core/signature.js';
import { sha256Bytes } from '../core/hash.js';
import { bytesToHex } from '../core/hex.js';
import { SecureKey } from '../core/secure-key.js';

export interface RollupCrypto {
  /** Public key for the handle, in the adapter's canonical encoding */
  publicKey(key: SecureKey): Uint8Array;
  sign(key: SecureKey, message: Uint8Array): Uint8Array;
  verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean;
  hash(message: Uint8Array): Uint8Array;
}

export const secp256k1RollupCrypto: RollupCrypto = {
  publicKey: (key) => key.useBytes((bytes) => secp256k1.getPublicKey(bytes, true)),

  sign: (key, message) =>
    key.useBytes((bytes) => secp256k1.sign(sha256Bytes(message), bytes).toCompactRawBytes()),

  verify: (publicKey, message, signature) => {
    try {
      return secp256k1.verify(signature, sha256Bytes(message), publicKey);
    } catch {
      return false;
    }
  },

  hash: (message) => sha256Bytes(message),
};

/**
 * Rollup public-key hash: last 20 bytes of the adapter hash of the public key
 */
export function pubKeyHash(crypto: RollupCrypto, publicKey: Uint8Array): PubKeyHash {
  const digest = crypto.hash(publicKey);
  if (digest.length < 20) {
    throw new Error(`Hash output too short for a public-key hash: ${digest.length} bytes`);
  }
  return `pkh:${bytesToHex(digest.slice(-20)).slice(2)}`;
}

/**
 * Fresh random rollup key
 */
export function generateRollupKey(): SecureKey {
  return SecureKey.fromBytes(secp256k1.utils.randomPrivateKey());
}
