/**
 * L1 client
 * Just enough of the base chain to follow a priority operation: receipts,
 * the current block, and the main contract's NewPriorityRequest event.
 */

import type { Address, Hash, Hex, L1Receipt, Log } from '../core/types.js';
import { eventTopic } from '../core/hash.js';
import { addressEquals, extractAddress } from '../core/address.js';
import { bytesToBigInt, bytesToHex, hexToBytes, hexToNumber, isHash, isHex } from '../core/hex.js';
import { ValidationError } from '../wallet/errors.js';
import type { RequestOptions, TransportOptions } from './transport.js';
import { JsonRpcTransport } from './transport.js';
import type { JsonRecord } from './decode.js';
import { asArray, asRecord, invalidResponse, readAddress, readHash, readHex } from './decode.js';

export type PriorityOpType = 'Deposit' | 'FullExit' | 'Unknown';

/**
 * Decoded NewPriorityRequest event
 */
export interface PriorityRequestEvent {
  readonly sender: Address;
  readonly serialId: bigint;
  readonly opType: PriorityOpType;
  readonly payload: Hex;
  readonly expirationBlock: bigint;
}

export interface ReceiptSource {
  getTransactionReceipt(hash: Hash, options?: RequestOptions): Promise<L1Receipt | null>;
}

export const NEW_PRIORITY_REQUEST_TOPIC = eventTopic('NewPriorityRequest(address,uint64,uint8,bytes,uint256)');

const OP_TYPES: Readonly<Record<number, PriorityOpType>> = {
  1: 'Deposit',
  6: 'FullExit',
};

function readQuantity(record: JsonRecord, key: string): number {
  return hexToNumber(readHex(record, key));
}

function parseLog(raw: unknown): Log {
  const record = asRecord(raw, 'log');
  return {
    address: readAddress(record, 'address'),
    topics: asArray(record['topics'], 'topics').map((topic) => {
      if (!isHash(topic)) throw invalidResponse('topic', topic);
      return topic;
    }),
    data: readHex(record, 'data'),
    blockNumber: readQuantity(record, 'blockNumber'),
    transactionHash: readHash(record, 'transactionHash'),
    logIndex: readQuantity(record, 'logIndex'),
  };
}

export function parseReceipt(raw: unknown): L1Receipt {
  const record = asRecord(raw, 'receipt');
  return {
    transactionHash: readHash(record, 'transactionHash'),
    blockNumber: readQuantity(record, 'blockNumber'),
    status: record['status'] === '0x1' ? 'success' : 'reverted',
    logs: asArray(record['logs'], 'logs').map(parseLog),
  };
}

/**
 * Decode a NewPriorityRequest event; all fields are non-indexed:
 * sender, serialId, opType, offset of pubData, expirationBlock, then pubData
 */
export function decodePriorityRequest(log: Log): PriorityRequestEvent {
  const data = hexToBytes(log.data);
  if (data.length < 32 * 6) {
    throw new ValidationError({
      code: 'INVALID_EVENT',
      message: `NewPriorityRequest data is ${data.length} bytes, expected at least 192`,
      details: { transactionHash: log.transactionHash, logIndex: log.logIndex },
    });
  }

  const word = (index: number): Uint8Array => data.slice(index * 32, index * 32 + 32);
  const pubDataOffset = bytesToBigInt(word(3));
  if (pubDataOffset + 32n > BigInt(data.length)) {
    throw new ValidationError({
      code: 'INVALID_EVENT',
      message: `NewPriorityRequest pubData offset ${pubDataOffset} is outside the ${data.length}-byte event data`,
      details: { transactionHash: log.transactionHash, logIndex: log.logIndex },
    });
  }
  const offset = Number(pubDataOffset);
  const length = Number(bytesToBigInt(data.slice(offset, offset + 32)));
  const payload = data.slice(offset + 32, offset + 32 + length);
  if (payload.length !== length) {
    throw new ValidationError({
      code: 'INVALID_EVENT',
      message: 'NewPriorityRequest payload is truncated',
      details: { transactionHash: log.transactionHash, expected: length, actual: payload.length },
    });
  }

  return {
    sender: extractAddress(bytesToHex(word(0))),
    serialId: bytesToBigInt(word(1)),
    opType: OP_TYPES[Number(bytesToBigInt(word(2)))] ?? 'Unknown',
    payload: bytesToHex(payload),
    expirationBlock: bytesToBigInt(word(4)),
  };
}

/**
 * First NewPriorityRequest in `logs`, optionally restricted to the main contract
 */
export function findPriorityRequest(logs: readonly Log[], mainContract?: Address): PriorityRequestEvent | null {
  for (const log of logs) {
    if (log.topics[0]?.toLowerCase() !== NEW_PRIORITY_REQUEST_TOPIC) continue;
    if (mainContract !== undefined && !addressEquals(log.address, mainContract)) continue;
    return decodePriorityRequest(log);
  }
  return null;
}

export class EthereumClient implements ReceiptSource {
  private readonly transport: JsonRpcTransport;

  constructor(options: TransportOptions | JsonRpcTransport) {
    this.transport = options instanceof JsonRpcTransport ? options : new JsonRpcTransport(options);
  }

  /**
   * Receipt, or null while the transaction is not yet included
   */
  async getTransactionReceipt(hash: Hash, options?: RequestOptions): Promise<L1Receipt | null> {
    const result = await this.transport.request('eth_getTransactionReceipt', [hash], options);
    return result === null ? null : parseReceipt(result);
  }

  async getBlockNumber(options?: RequestOptions): Promise<number> {
    const result = await this.transport.request('eth_blockNumber', [], options);
    if (!isHex(result)) throw invalidResponse('eth_blockNumber result', result);
    return hexToNumber(result);
  }
}
