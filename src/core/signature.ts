/**
 * ECDSA signature handling
 * Wrapper around @noble/secp256k1 for base-chain (L1) signatures
 */

import * as secp256k1 from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha2';
import type { Address, Hash, Hex, Signature } from './types.js';
import { bytesToHex, hexToBytes, padHex, concatHex } from './hex.js';
import { hashMessage, keccak256 } from './hash.js';

// Synchronous signing needs an HMAC-SHA256 implementation (RFC 6979 nonces)
if (secp256k1.etc.hmacSha256Sync === undefined) {
  secp256k1.etc.hmacSha256Sync = (key: Uint8Array, ...messages: Uint8Array[]): Uint8Array =>
    hmac(sha256, key, secp256k1.etc.concatBytes(...messages));
}

export { secp256k1 };

/**
 * Generate a random private key
 */
export function generatePrivateKey(): Hex {
  return bytesToHex(secp256k1.utils.randomPrivateKey());
}

/**
 * Derive public key from private key
 */
export function privateKeyToPublicKey(privateKey: Hex, compressed = false): Hex {
  return bytesToHex(secp256k1.getPublicKey(hexToBytes(privateKey), compressed));
}

/**
 * Derive Ethereum address from public key
 */
export function publicKeyToAddress(publicKey: Hex): Address {
  const pubKeyBytes = hexToBytes(publicKey);

  const uncompressed =
    pubKeyBytes.length === 33
      ? secp256k1.ProjectivePoint.fromHex(pubKeyBytes).toRawBytes(false)
      : pubKeyBytes;

  // Skip the 0x04 prefix, keep the last 20 bytes of the hash
  const hash = keccak256(uncompressed.slice(1));
  return `0x${hash.slice(-40)}` as Address;
}

/**
 * Derive Ethereum address from private key
 */
export function privateKeyToAddress(privateKey: Hex): Address {
  return publicKeyToAddress(privateKeyToPublicKey(privateKey, false));
}

/**
 * Sign a 32-byte hash with a private key
 */
export function sign(hash: Hash, privateKey: Hex): Signature {
  const hashBytes = hexToBytes(hash);

  if (hashBytes.length !== 32) {
    throw new Error(`Hash must be 32 bytes, got ${hashBytes.length}`);
  }

  const sig = secp256k1.sign(hashBytes, hexToBytes(privateKey));
  const compact = sig.toCompactRawBytes();

  return {
    r: padHex(bytesToHex(compact.slice(0, 32)), 32),
    s: padHex(bytesToHex(compact.slice(32, 64)), 32),
    v: sig.recovery + 27,
    yParity: sig.recovery === 1 ? 1 : 0,
  };
}

/**
 * Sign a message according to EIP-191 personal sign
 */
export function signMessage(message: string | Uint8Array, privateKey: Hex): Signature {
  return sign(hashMessage(message), privateKey);
}

/**
 * Recover address from a signature over a hash
 */
export function recoverAddress(hash: Hash, signature: Signature): Address {
  const sigBytes = new Uint8Array(64);
  sigBytes.set(hexToBytes(signature.r), 0);
  sigBytes.set(hexToBytes(signature.s), 32);

  const pubKey = secp256k1.Signature.fromCompact(sigBytes)
    .addRecoveryBit(signature.yParity)
    .recoverPublicKey(hexToBytes(hash));

  return publicKeyToAddress(bytesToHex(pubKey.toRawBytes(false)));
}

/**
 * Check that a personal-sign signature was produced by `address`
 */
export function verifyMessage(message: string | Uint8Array, signature: Signature, address: Address): boolean {
  try {
    return recoverAddress(hashMessage(message), signature).toLowerCase() === address.toLowerCase();
  } catch {
    return false;
  }
}

/**
 * Serialize signature to hex (r + s + v)
 */
export function serializeSignature(signature: Signature): Hex {
  const v = signature.v.toString(16).padStart(2, '0');
  return concatHex(signature.r, signature.s, `0x${v}`);
}

/**
 * Deserialize signature from hex
 */
export function deserializeSignature(hex: Hex): Signature {
  const bytes = hexToBytes(hex);

  if (bytes.length !== 65) {
    throw new Error(`Invalid signature length: ${bytes.length}, expected 65`);
  }

  const vByte = bytes[64] ?? 0;
  const yParity: 0 | 1 = vByte === 1 || vByte === 28 ? 1 : 0;

  return {
    r: bytesToHex(bytes.slice(0, 32)),
    s: bytesToHex(bytes.slice(32, 64)),
    v: yParity + 27,
    yParity,
  };
}

/**
 * Check if a private key is valid
 */
export function isValidPrivateKey(privateKey: Hex): boolean {
  try {
    const bytes = hexToBytes(privateKey);
    if (bytes.length !== 32) return false;
    return secp256k1.utils.isValidPrivateKey(bytes);
  } catch {
    return false;
  }
}
