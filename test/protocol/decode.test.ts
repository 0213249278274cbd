import { describe, it, expect } from 'vitest';
import {
  asArray,
  asRecord,
  invalidResponse,
  readAddress,
  readBigInt,
  readBoolean,
  readHash,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readString,
} from '../../src/protocol/decode.js';

describe('JSON narrowing', () => {
  const record = {
    name: 'ETH',
    committed: true,
    id: 7,
    amount: '1000000000000000000',
    hexAmount: '0x1b4',
    address: '0x1234567890123456789012345678901234567890',
    hash: `0x${'ab'.repeat(32)}`,
    missing: null,
  };

  it('reads typed fields', () => {
    expect(readString(record, 'name')).toBe('ETH');
    expect(readBoolean(record, 'committed')).toBe(true);
    expect(readNumber(record, 'id')).toBe(7);
    expect(readAddress(record, 'address')).toBe('0x1234567890123456789012345678901234567890');
    expect(readHash(record, 'hash')).toBe(`0x${'ab'.repeat(32)}`);
  });

  it('reads big integers from decimal, hex and numbers', () => {
    expect(readBigInt(record, 'amount')).toBe(10n ** 18n);
    expect(readBigInt(record, 'hexAmount')).toBe(436n);
    expect(readBigInt(record, 'id')).toBe(7n);
    expect(() => readBigInt(record, 'name')).toThrow('Unexpected name in RPC response: "ETH"');
  });

  it('maps absent optional fields to null', () => {
    expect(readOptionalString(record, 'missing')).toBeNull();
    expect(readOptionalString(record, 'nothing')).toBeNull();
    expect(readOptionalNumber(record, 'missing')).toBeNull();
    expect(readOptionalNumber(record, 'id')).toBe(7);
    expect(() => readOptionalString(record, 'id')).toThrow('Unexpected id in RPC response: 7');
  });

  it('rejects fields of the wrong type', () => {
    expect(() => readString(record, 'id')).toThrow('Unexpected id in RPC response: 7');
    expect(() => readNumber(record, 'name')).toThrow('Unexpected name in RPC response: "ETH"');
    expect(() => readAddress(record, 'hash')).toThrow();
    expect(() => readBoolean(record, 'nothing')).toThrow('Unexpected nothing in RPC response: undefined');
  });

  it('checks containers', () => {
    expect(asRecord({ a: 1 }, 'account')).toEqual({ a: 1 });
    expect(() => asRecord([1], 'account')).toThrow('Unexpected account in RPC response: [1]');
    expect(asArray([1, 2], 'tokens')).toEqual([1, 2]);
    expect(() => asArray({}, 'tokens')).toThrow('Unexpected tokens in RPC response: {}');
  });

  it('truncates long values in the message', () => {
    const error = invalidResponse('result', 'x'.repeat(500));

    expect(error.code).toBe('INVALID_RESPONSE');
    expect(error.message).toBe(`Unexpected result in RPC response: "${'x'.repeat(199)}`);
  });
});
