/**
 * Canonical byte encoding
 *
 * Every variant has exactly one layout: `[255 - typeId, version]` followed by its
 * fields in fixed order and fixed widths, big-endian. The rollup signature covers
 * these bytes, so the encoding must never depend on anything but the transaction.
 */

import type { Address, PubKeyHash, TxHash } from '../core/types.js';
import { bytesToHex, concatBytes, hexToBytes, uintToBytes } from '../core/hex.js';
import { sha256Bytes } from '../core/hash.js';
import { packAmount, packFee } from './packing.js';
import type { Order, RollupTransaction, TimeRange, TransactionType } from './transaction.js';

export const TRANSACTION_VERSION = 1;
export const ORDER_PREFIX = 0x6f; // 'o'

export const TX_TYPE_IDS: Readonly<Record<TransactionType, number>> = {
  Withdraw: 3,
  Transfer: 5,
  ChangePubKey: 7,
  ForcedExit: 8,
  MintNFT: 9,
  WithdrawNFT: 10,
  Swap: 11,
};

const u32 = (value: number): Uint8Array => uintToBytes(value, 4);
const u64 = (value: bigint): Uint8Array => uintToBytes(value, 8);

function addressBytes(address: Address): Uint8Array {
  return hexToBytes(address);
}

function pubKeyHashBytes(pkh: PubKeyHash): Uint8Array {
  return hexToBytes(`0x${pkh.slice(4)}`);
}

function timeRangeBytes(range: TimeRange): Uint8Array {
  return concatBytes(u64(range.validFrom), u64(range.validUntil));
}

function header(type: TransactionType): Uint8Array {
  return Uint8Array.of(255 - TX_TYPE_IDS[type], TRANSACTION_VERSION);
}

/**
 * Encoding of one side of a Swap
 */
export function encodeOrder(order: Order): Uint8Array {
  return concatBytes(
    Uint8Array.of(ORDER_PREFIX, TRANSACTION_VERSION),
    u32(order.accountId),
    addressBytes(order.recipient),
    u32(order.nonce),
    u32(order.tokenSell),
    u32(order.tokenBuy),
    uintToBytes(order.ratio[0], 15),
    uintToBytes(order.ratio[1], 15),
    packAmount(order.amount),
    timeRangeBytes(order)
  );
}

export function encodeTransaction(tx: RollupTransaction): Uint8Array {
  switch (tx.type) {
    case 'Transfer':
      return concatBytes(
        header(tx.type),
        u32(tx.accountId),
        addressBytes(tx.from),
        addressBytes(tx.to),
        u32(tx.token),
        packAmount(tx.amount),
        packFee(tx.fee),
        u32(tx.nonce),
        timeRangeBytes(tx)
      );
    case 'Withdraw':
      return concatBytes(
        header(tx.type),
        u32(tx.accountId),
        addressBytes(tx.from),
        addressBytes(tx.to),
        u32(tx.token),
        u32(tx.feeToken),
        uintToBytes(tx.amount, 16),
        packFee(tx.fee),
        u32(tx.nonce),
        timeRangeBytes(tx)
      );
    case 'ChangePubKey':
      return concatBytes(
        header(tx.type),
        u32(tx.accountId),
        addressBytes(tx.account),
        pubKeyHashBytes(tx.newPkHash),
        u32(tx.feeToken),
        packFee(tx.fee),
        u32(tx.nonce),
        timeRangeBytes(tx)
      );
    case 'ForcedExit':
      return concatBytes(
        header(tx.type),
        u32(tx.initiatorAccountId),
        addressBytes(tx.target),
        u32(tx.token),
        packFee(tx.fee),
        u32(tx.nonce),
        timeRangeBytes(tx)
      );
    case 'MintNFT':
      return concatBytes(
        header(tx.type),
        u32(tx.creatorId),
        addressBytes(tx.creatorAddress),
        hexToBytes(tx.contentHash),
        addressBytes(tx.recipient),
        u32(tx.feeToken),
        packFee(tx.fee),
        u32(tx.nonce)
      );
    case 'WithdrawNFT':
      return concatBytes(
        header(tx.type),
        u32(tx.accountId),
        addressBytes(tx.from),
        addressBytes(tx.to),
        u32(tx.token),
        u32(tx.feeToken),
        packFee(tx.fee),
        u32(tx.nonce),
        timeRangeBytes(tx)
      );
    case 'Swap':
      return concatBytes(
        header(tx.type),
        u32(tx.submitterId),
        addressBytes(tx.submitterAddress),
        u32(tx.nonce),
        encodeOrder(tx.orders[0]),
        encodeOrder(tx.orders[1]),
        u32(tx.feeToken),
        packFee(tx.fee),
        packAmount(tx.amounts[0]),
        packAmount(tx.amounts[1])
      );
  }
}

/**
 * Operator-style transaction hash: `sync-tx:` + sha256 of the encoding
 */
export function transactionHash(tx: RollupTransaction): TxHash {
  return toTxHash(`sync-tx:${bytesToHex(sha256Bytes(encodeTransaction(tx))).slice(2)}`);
}

export function isTxHash(value: unknown): value is TxHash {
  return typeof value === 'string' && /^sync-tx:[0-9a-f]{64}$/.test(value);
}

/**
 * Validate an operator-supplied hash
 */
export function toTxHash(value: string): TxHash {
  const normalized = value.toLowerCase();
  if (!isTxHash(normalized)) {
    throw new Error(`Invalid transaction hash: ${value}`);
  }
  return normalized;
}
