import { describe, it, expect } from 'vitest';
import { keccak256, sha256, sha256Bytes, eventTopic, hashMessage } from '../../src/core/hash.js';
import { bytesToHex } from '../../src/core/hex.js';

describe('hash functions', () => {
  describe('keccak256', () => {
    it('hashes the empty string', () => {
      expect(keccak256('')).toBe('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470');
    });

    it('hashes text as UTF-8', () => {
      expect(keccak256('hello')).toBe('0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8');
    });

    it('treats hex strings as bytes', () => {
      expect(keccak256('0x68656c6c6f')).toBe(keccak256('hello'));
      expect(keccak256(new TextEncoder().encode('hello'))).toBe(keccak256('hello'));
    });
  });

  describe('sha256', () => {
    it('hashes known vectors', () => {
      expect(sha256('')).toBe('0xe3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(sha256('abc')).toBe('0xba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('returns the raw digest', () => {
      const bytes = new TextEncoder().encode('abc');
      expect(bytesToHex(sha256Bytes(bytes))).toBe(sha256('abc'));
    });
  });

  it('computes event topics', () => {
    expect(eventTopic('Transfer(address,address,uint256)')).toBe(
      '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef'
    );
  });

  describe('hashMessage', () => {
    it('applies the personal-sign prefix', () => {
      expect(hashMessage('hello world')).toBe('0xd9eba16ed0ecae432b71fe008c98cc872bb4cc214d3220a36f365326cf807d68');
    });

    it('hashes bytes and strings alike', () => {
      expect(hashMessage(new TextEncoder().encode('hello world'))).toBe(hashMessage('hello world'));
    });

    it('counts bytes, not characters, in the prefix', () => {
      const message = 'é';
      const prefix = new TextEncoder().encode('\x19Ethereum Signed Message:\n2');
      const body = new TextEncoder().encode(message);
      const combined = new Uint8Array([...prefix, ...body]);

      expect(hashMessage(message)).toBe(keccak256(combined));
    });
  });
});
