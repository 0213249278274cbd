/**
 * Secure Key Management
 * Opaque key handles with scoped access and explicit disposal
 */

import type { Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex } from './hex.js';

/**
 * SecureKey wraps private key material so that callers never hold it directly.
 * Both the base-chain key and the rollup signing key are passed around as SecureKey.
 *
 * ```typescript
 * const key = SecureKey.fromHex(privateKeyHex);
 * const signature = key.use((hex) => signMessage(message, hex));
 * key.dispose();
 * ```
 */
export class SecureKey {
  private readonly bytes: Uint8Array;
  private disposed = false;

  private constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  static fromHex(hex: string): SecureKey {
    const normalized = hex.startsWith('0x') ? hex : `0x${hex}`;
    if (!isHex(normalized)) {
      throw new Error('Key must be a hex string');
    }
    return new SecureKey(hexToBytes(normalized));
  }

  static fromBytes(bytes: Uint8Array): SecureKey {
    return new SecureKey(bytes);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Run `fn` with the key as hex
   * @throws Error if the key has been disposed
   */
  use<T>(fn: (key: Hex) => T): T {
    this.assertNotDisposed();
    return fn(bytesToHex(this.bytes));
  }

  /**
   * Run `fn` with a copy of the raw key bytes
   * @throws Error if the key has been disposed
   */
  useBytes<T>(fn: (keyBytes: Uint8Array) => T): T {
    this.assertNotDisposed();
    const copy = new Uint8Array(this.bytes);
    try {
      return fn(copy);
    } finally {
      copy.fill(0);
    }
  }

  /**
   * Zero the key material. Any later use throws.
   */
  dispose(): void {
    if (this.disposed) return;
    this.bytes.fill(0);
    this.disposed = true;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new Error('SecureKey has been disposed and cannot be used');
    }
  }
}
