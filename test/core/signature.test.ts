import { describe, it, expect } from 'vitest';
import {
  generatePrivateKey,
  privateKeyToPublicKey,
  publicKeyToAddress,
  privateKeyToAddress,
  sign,
  signMessage,
  recoverAddress,
  verifyMessage,
  serializeSignature,
  deserializeSignature,
  isValidPrivateKey,
} from '../../src/core/signature.js';
import { hashMessage, keccak256 } from '../../src/core/hash.js';
import { bytesToHex, hexToBytes } from '../../src/core/hex.js';
import type { Hex } from '../../src/core/types.js';
import { L1_KEY_HEX, OTHER_KEY_HEX } from '../helpers/fakes.js';

const KEY_ONE: Hex = `0x${'00'.repeat(31)}01`;

describe('ECDSA signatures', () => {
  describe('key derivation', () => {
    it('derives the address of a known key', () => {
      expect(privateKeyToAddress(KEY_ONE)).toBe('0x7e5f4552091a69125d5dfcb7b8c2659029395bdf');
    });

    it('gives the same address for compressed and uncompressed keys', () => {
      const compressed = privateKeyToPublicKey(L1_KEY_HEX, true);
      const uncompressed = privateKeyToPublicKey(L1_KEY_HEX);

      expect(hexToBytes(compressed).length).toBe(33);
      expect(hexToBytes(uncompressed).length).toBe(65);
      expect(publicKeyToAddress(compressed)).toBe(publicKeyToAddress(uncompressed));
    });

    it('generates valid keys', () => {
      expect(isValidPrivateKey(generatePrivateKey())).toBe(true);
      expect(isValidPrivateKey(`0x${'00'.repeat(32)}`)).toBe(false);
      expect(isValidPrivateKey('0x1234')).toBe(false);
    });
  });

  describe('signing', () => {
    const hash = keccak256('payload');

    it('signs and recovers the signer', () => {
      const signature = sign(hash, L1_KEY_HEX);

      expect(signature.v).toBe(27 + signature.yParity);
      expect(recoverAddress(hash, signature)).toBe(privateKeyToAddress(L1_KEY_HEX));
    });

    it('is deterministic', () => {
      expect(sign(hash, L1_KEY_HEX)).toEqual(sign(hash, L1_KEY_HEX));
    });
  });

  describe('personal messages', () => {
    it('verifies the signer of a message', () => {
      const signature = signMessage('Register', L1_KEY_HEX);

      expect(recoverAddress(hashMessage('Register'), signature)).toBe(privateKeyToAddress(L1_KEY_HEX));
      expect(verifyMessage('Register', signature, privateKeyToAddress(L1_KEY_HEX))).toBe(true);
      expect(verifyMessage('Register', signature, privateKeyToAddress(OTHER_KEY_HEX))).toBe(false);
      expect(verifyMessage('Tampered', signature, privateKeyToAddress(L1_KEY_HEX))).toBe(false);
    });

    it('returns false for a malformed signature', () => {
      const broken = { r: `0x${'00'.repeat(32)}`, s: `0x${'00'.repeat(32)}`, v: 27, yParity: 0 } as const;
      expect(verifyMessage('Register', broken, privateKeyToAddress(L1_KEY_HEX))).toBe(false);
    });
  });

  describe('serialization', () => {
    it('serializes r, s and v into 65 bytes', () => {
      const signature = signMessage('Register', L1_KEY_HEX);
      const hex = serializeSignature(signature);

      expect(hexToBytes(hex).length).toBe(65);
      expect(deserializeSignature(hex)).toEqual(signature);
    });

    it('accepts 0/1 recovery bytes', () => {
      const signature = signMessage('Register', L1_KEY_HEX);
      const raw = hexToBytes(serializeSignature(signature));
      raw[64] = signature.yParity;
      expect(deserializeSignature(bytesToHex(raw))).toEqual(signature);
    });

    it('rejects other lengths', () => {
      expect(() => deserializeSignature('0x1234')).toThrow('Invalid signature length: 2, expected 65');
    });
  });
});
