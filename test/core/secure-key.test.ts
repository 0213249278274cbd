import { describe, it, expect } from 'vitest';
import { SecureKey } from '../../src/core/secure-key.js';
import { L1_KEY_HEX } from '../helpers/fakes.js';

describe('SecureKey', () => {
  it('exposes the key only inside use()', () => {
    const key = SecureKey.fromHex(L1_KEY_HEX);
    expect(key.use((hex) => hex)).toBe(L1_KEY_HEX);
  });

  it('accepts hex without a prefix', () => {
    const key = SecureKey.fromHex('11'.repeat(32));
    expect(key.use((hex) => hex)).toBe(L1_KEY_HEX);
  });

  it('rejects non-hex input', () => {
    expect(() => SecureKey.fromHex('not-a-key')).toThrow('Key must be a hex string');
  });

  it('copies the bytes it is created from', () => {
    const source = new Uint8Array(32).fill(0x22);
    const key = SecureKey.fromBytes(source);
    source.fill(0);

    expect(key.useBytes((bytes) => bytes[0])).toBe(0x22);
  });

  it('zeroes the copy handed to useBytes afterwards', () => {
    const key = SecureKey.fromHex(L1_KEY_HEX);
    let leaked = new Uint8Array();
    key.useBytes((bytes) => {
      leaked = bytes;
    });

    expect(leaked.every((b) => b === 0)).toBe(true);
    expect(key.use((hex) => hex)).toBe(L1_KEY_HEX);
  });

  it('refuses every use after dispose', () => {
    const key = SecureKey.fromHex(L1_KEY_HEX);
    key.dispose();
    key.dispose();

    expect(key.isDisposed).toBe(true);
    expect(() => key.use((hex) => hex)).toThrow('SecureKey has been disposed and cannot be used');
    expect(() => key.useBytes((bytes) => bytes)).toThrow('SecureKey has been disposed');
  });
});
