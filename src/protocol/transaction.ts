/**
 * Rollup transaction model
 *
 * A closed tagged union of transaction variants. Builders validate every field,
 * round packable amounts down and report each trimmed field as a PrecisionLoss.
 */

import type { Address, Hash, Hex, PubKeyHash } from '../core/types.js';
import { isAddress } from '../core/address.js';
import { isHash } from '../core/hex.js';
import type { PrecisionLoss } from '../wallet/errors.js';
import { ValidationError, InvalidAddressError, InvalidAmountError } from '../wallet/errors.js';
import { AMOUNT_FORMAT, FEE_FORMAT, closestPackable } from './packing.js';
import { isFungibleTokenId, isNFTTokenId } from './tokens.js';

export type TransactionType = 'Transfer' | 'Withdraw' | 'ChangePubKey' | 'ForcedExit' | 'MintNFT' | 'WithdrawNFT' | 'Swap';

export type EthAuthType = 'ECDSA' | 'Onchain';

export const DEFAULT_VALID_FROM = 0n;
export const DEFAULT_VALID_UNTIL = 4_294_967_295n;

const MAX_U32 = 0xffff_ffff;
const MAX_U64 = (1n << 64n) - 1n;
const MAX_U120 = (1n << 120n) - 1n;
const MAX_U128 = (1n << 128n) - 1n;

export interface TimeRange {
  readonly validFrom: bigint;
  readonly validUntil: bigint;
}

/** Rollup-key signature: compressed public key plus signature bytes */
export interface RollupSignature {
  readonly pubKey: Hex;
  readonly signature: Hex;
}

export interface Transfer extends TimeRange {
  readonly type: 'Transfer';
  readonly accountId: number;
  readonly from: Address;
  readonly to: Address;
  readonly token: number;
  readonly amount: bigint;
  readonly fee: bigint;
  readonly nonce: number;
}

export interface Withdraw extends TimeRange {
  readonly type: 'Withdraw';
  readonly accountId: number;
  readonly from: Address;
  /** Base-chain recipient */
  readonly to: Address;
  readonly token: number;
  readonly feeToken: number;
  /** Full u128, not packed */
  readonly amount: bigint;
  readonly fee: bigint;
  readonly nonce: number;
  readonly fastProcessing: boolean;
}

export interface ChangePubKey extends TimeRange {
  readonly type: 'ChangePubKey';
  readonly accountId: number;
  readonly account: Address;
  readonly newPkHash: PubKeyHash;
  readonly feeToken: number;
  readonly fee: bigint;
  readonly nonce: number;
  readonly ethAuthType: EthAuthType;
}

export interface ForcedExit extends TimeRange {
  readonly type: 'ForcedExit';
  readonly initiatorAccountId: number;
  readonly target: Address;
  readonly token: number;
  readonly fee: bigint;
  readonly nonce: number;
}

export interface MintNFT {
  readonly type: 'MintNFT';
  readonly creatorId: number;
  readonly creatorAddress: Address;
  readonly contentHash: Hash;
  readonly recipient: Address;
  readonly feeToken: number;
  readonly fee: bigint;
  readonly nonce: number;
}

export interface WithdrawNFT extends TimeRange {
  readonly type: 'WithdrawNFT';
  readonly accountId: number;
  readonly from: Address;
  readonly to: Address;
  readonly token: number;
  readonly feeToken: number;
  readonly fee: bigint;
  readonly nonce: number;
}

/** One side of a Swap */
export interface Order extends TimeRange {
  readonly accountId: number;
  readonly recipient: Address;
  readonly nonce: number;
  readonly tokenSell: number;
  readonly tokenBuy: number;
  /** [sell, buy] */
  readonly ratio: readonly [bigint, bigint];
  readonly amount: bigint;
}

export interface SignedOrder extends Order {
  readonly signature: RollupSignature;
}

export interface Swap {
  readonly type: 'Swap';
  readonly submitterId: number;
  readonly submitterAddress: Address;
  readonly nonce: number;
  readonly orders: readonly [SignedOrder, SignedOrder];
  readonly amounts: readonly [bigint, bigint];
  readonly feeToken: number;
  readonly fee: bigint;
}

export type RollupTransaction = Transfer | Withdraw | ChangePubKey | ForcedExit | MintNFT | WithdrawNFT | Swap;

export interface BuiltTransaction<T> {
  readonly tx: T;
  readonly precisionLoss: readonly PrecisionLoss[];
}

// ============ Requests ============

interface ValidityFields {
  validFrom?: number | bigint;
  validUntil?: number | bigint;
}

export interface TransferFields extends ValidityFields {
  accountId: number;
  from: string;
  to: string;
  token: number;
  amount: bigint;
  fee: bigint;
  nonce: number;
}

export interface WithdrawFields extends ValidityFields {
  accountId: number;
  from: string;
  to: string;
  token: number;
  feeToken?: number;
  amount: bigint;
  fee: bigint;
  nonce: number;
  fastProcessing?: boolean;
}

export interface ChangePubKeyFields extends ValidityFields {
  accountId: number;
  account: string;
  newPkHash: string;
  feeToken: number;
  fee: bigint;
  nonce: number;
  ethAuthType?: EthAuthType;
}

export interface ForcedExitFields extends ValidityFields {
  initiatorAccountId: number;
  target: string;
  token: number;
  fee: bigint;
  nonce: number;
}

export interface MintNFTFields {
  creatorId: number;
  creatorAddress: string;
  contentHash: string;
  recipient: string;
  feeToken: number;
  fee: bigint;
  nonce: number;
}

export interface WithdrawNFTFields extends ValidityFields {
  accountId: number;
  from: string;
  to: string;
  token: number;
  feeToken: number;
  fee: bigint;
  nonce: number;
}

export interface OrderFields extends ValidityFields {
  accountId: number;
  recipient: string;
  nonce: number;
  tokenSell: number;
  tokenBuy: number;
  ratio: readonly [bigint, bigint];
  amount: bigint;
}

export interface SwapFields {
  submitterId: number;
  submitterAddress: string;
  nonce: number;
  orders: readonly [SignedOrder, SignedOrder];
  amounts: readonly [bigint, bigint];
  feeToken: number;
  fee: bigint;
}

export type TransactionRequest =
  | ({ type: 'Transfer' } & TransferFields)
  | ({ type: 'Withdraw' } & WithdrawFields)
  | ({ type: 'ChangePubKey' } & ChangePubKeyFields)
  | ({ type: 'ForcedExit' } & ForcedExitFields)
  | ({ type: 'MintNFT' } & MintNFTFields)
  | ({ type: 'WithdrawNFT' } & WithdrawNFTFields)
  | ({ type: 'Swap' } & SwapFields);

// ============ Field validation ============

function invalid(field: string, value: unknown, reason: string): ValidationError {
  return new ValidationError({
    code: 'INVALID_FIELD',
    message: `Invalid ${field} "${String(value)}": ${reason}`,
    details: { field, value: String(value), reason },
    suggestion: `Fix ${field} and build the transaction again`,
  });
}

function u32(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
    throw invalid(field, value, 'must be an integer in 0..4294967295');
  }
  return value;
}

function address(field: string, value: string): Address {
  if (!isAddress(value)) {
    throw new InvalidAddressError(value, field);
  }
  return value;
}

function fungibleToken(field: string, value: number): number {
  if (!isFungibleTokenId(value)) {
    throw invalid(field, value, 'must be a fungible token id (0..65535)');
  }
  return value;
}

function nftToken(field: string, value: number): number {
  if (!isNFTTokenId(value)) {
    throw invalid(field, value, 'must be an NFT token id (65536 and above)');
  }
  return value;
}

function timestamp(field: string, value: number | bigint): bigint {
  if (typeof value === 'number' && !Number.isInteger(value)) throw invalid(field, value, 'must be an integer');
  return BigInt(value);
}

function timeRange(fields: ValidityFields): TimeRange {
  const validFrom = timestamp('validFrom', fields.validFrom ?? DEFAULT_VALID_FROM);
  const validUntil = timestamp('validUntil', fields.validUntil ?? DEFAULT_VALID_UNTIL);
  if (validFrom < 0n || validFrom > MAX_U64) throw invalid('validFrom', validFrom, 'must fit into u64');
  if (validUntil < 0n || validUntil > MAX_U64) throw invalid('validUntil', validUntil, 'must fit into u64');
  if (validFrom > validUntil) throw invalid('validFrom', validFrom, `must not be after validUntil ${validUntil}`);
  return { validFrom, validUntil };
}

function pubKeyHash(value: string): PubKeyHash {
  if (!/^pkh:[0-9a-fA-F]{40}$/.test(value)) {
    throw invalid('newPkHash', value, 'must be "pkh:" followed by 40 hex characters');
  }
  return `pkh:${value.slice(4).toLowerCase()}`;
}

function contentHash(value: string): Hash {
  if (!isHash(value)) {
    throw invalid('contentHash', value, 'must be 32 bytes of hex');
  }
  return value;
}

function fullAmount(field: string, value: bigint): bigint {
  if (value < 0n) throw new InvalidAmountError(field, value, 'must not be negative');
  if (value > MAX_U128) throw new InvalidAmountError(field, value, 'does not fit into u128');
  return value;
}

function ratioPart(field: string, value: bigint): bigint {
  if (value < 0n || value > MAX_U120) throw new InvalidAmountError(field, value, 'must fit into u120');
  return value;
}

/**
 * Collects the round-down results of packable fields
 */
class Packer {
  readonly losses: PrecisionLoss[] = [];

  amount(field: string, value: bigint): bigint {
    return this.record(field, value, closestPackable(value, AMOUNT_FORMAT));
  }

  fee(field: string, value: bigint): bigint {
    return this.record(field, value, closestPackable(value, FEE_FORMAT));
  }

  private record(field: string, requested: bigint, packed: bigint): bigint {
    if (packed !== requested) {
      this.losses.push({ field, requested, packed });
    }
    return packed;
  }
}

function withLosses<T>(packer: Packer, tx: T): BuiltTransaction<T> {
  return { tx, precisionLoss: packer.losses };
}

// ============ Builders ============

export function buildTransfer(fields: TransferFields): BuiltTransaction<Transfer> {
  const packer = new Packer();
  return withLosses<Transfer>(packer, {
    type: 'Transfer',
    accountId: u32('accountId', fields.accountId),
    from: address('from', fields.from),
    to: address('to', fields.to),
    token: fungibleToken('token', fields.token),
    amount: packer.amount('amount', fields.amount),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
    ...timeRange(fields),
  });
}

export function buildWithdraw(fields: WithdrawFields): BuiltTransaction<Withdraw> {
  const packer = new Packer();
  return withLosses<Withdraw>(packer, {
    type: 'Withdraw',
    accountId: u32('accountId', fields.accountId),
    from: address('from', fields.from),
    to: address('to', fields.to),
    token: fungibleToken('token', fields.token),
    feeToken: fungibleToken('feeToken', fields.feeToken ?? fields.token),
    amount: fullAmount('amount', fields.amount),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
    fastProcessing: fields.fastProcessing ?? false,
    ...timeRange(fields),
  });
}

export function buildChangePubKey(fields: ChangePubKeyFields): BuiltTransaction<ChangePubKey> {
  const packer = new Packer();
  return withLosses<ChangePubKey>(packer, {
    type: 'ChangePubKey',
    accountId: u32('accountId', fields.accountId),
    account: address('account', fields.account),
    newPkHash: pubKeyHash(fields.newPkHash),
    feeToken: fungibleToken('feeToken', fields.feeToken),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
    ethAuthType: fields.ethAuthType ?? 'ECDSA',
    ...timeRange(fields),
  });
}

export function buildForcedExit(fields: ForcedExitFields): BuiltTransaction<ForcedExit> {
  const packer = new Packer();
  return withLosses<ForcedExit>(packer, {
    type: 'ForcedExit',
    initiatorAccountId: u32('initiatorAccountId', fields.initiatorAccountId),
    target: address('target', fields.target),
    token: fungibleToken('token', fields.token),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
    ...timeRange(fields),
  });
}

export function buildMintNFT(fields: MintNFTFields): BuiltTransaction<MintNFT> {
  const packer = new Packer();
  return withLosses<MintNFT>(packer, {
    type: 'MintNFT',
    creatorId: u32('creatorId', fields.creatorId),
    creatorAddress: address('creatorAddress', fields.creatorAddress),
    contentHash: contentHash(fields.contentHash),
    recipient: address('recipient', fields.recipient),
    feeToken: fungibleToken('feeToken', fields.feeToken),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
  });
}

export function buildWithdrawNFT(fields: WithdrawNFTFields): BuiltTransaction<WithdrawNFT> {
  const packer = new Packer();
  return withLosses<WithdrawNFT>(packer, {
    type: 'WithdrawNFT',
    accountId: u32('accountId', fields.accountId),
    from: address('from', fields.from),
    to: address('to', fields.to),
    token: nftToken('token', fields.token),
    feeToken: fungibleToken('feeToken', fields.feeToken),
    fee: packer.fee('fee', fields.fee),
    nonce: u32('nonce', fields.nonce),
    ...timeRange(fields),
  });
}

export function buildOrder(fields: OrderFields): BuiltTransaction<Order> {
  const packer = new Packer();
  const tokenSell = fungibleToken('tokenSell', fields.tokenSell);
  const tokenBuy = fungibleToken('tokenBuy', fields.tokenBuy);
  if (tokenSell === tokenBuy) {
    throw invalid('tokenBuy', tokenBuy, 'must differ from tokenSell');
  }
  return withLosses<Order>(packer, {
    accountId: u32('accountId', fields.accountId),
    recipient: address('recipient', fields.recipient),
    nonce: u32('nonce', fields.nonce),
    tokenSell,
    tokenBuy,
    ratio: [ratioPart('ratio[0]', fields.ratio[0]), ratioPart('ratio[1]', fields.ratio[1])],
    amount: packer.amount('amount', fields.amount),
    ...timeRange(fields),
  });
}

export function buildSwap(fields: SwapFields): BuiltTransaction<Swap> {
  const packer = new Packer();
  const [first, second] = fields.orders;
  if (first.tokenSell !== second.tokenBuy || first.tokenBuy !== second.tokenSell) {
    throw invalid('orders', `${first.tokenSell}/${first.tokenBuy}`, 'orders must trade opposite sides of one pair');
  }
  return withLosses<Swap>(packer, {
    type: 'Swap',
    submitterId: u32('submitterId', fields.submitterId),
    submitterAddress: address('submitterAddress', fields.submitterAddress),
    nonce: u32('nonce', fields.nonce),
    orders: fields.orders,
    amounts: [packer.amount('amounts[0]', fields.amounts[0]), packer.amount('amounts[1]', fields.amounts[1])],
    feeToken: fungibleToken('feeToken', fields.feeToken),
    fee: packer.fee('fee', fields.fee),
  });
}

/**
 * Build any variant by its tag
 */
export function buildTransaction(request: TransactionRequest): BuiltTransaction<RollupTransaction> {
  switch (request.type) {
    case 'Transfer':
      return buildTransfer(request);
    case 'Withdraw':
      return buildWithdraw(request);
    case 'ChangePubKey':
      return buildChangePubKey(request);
    case 'ForcedExit':
      return buildForcedExit(request);
    case 'MintNFT':
      return buildMintNFT(request);
    case 'WithdrawNFT':
      return buildWithdrawNFT(request);
    case 'Swap':
      return buildSwap(request);
  }
}

/**
 * Address that authorises the transaction on the base chain
 */
export function transactionSender(tx: RollupTransaction): Address | null {
  switch (tx.type) {
    case 'Transfer':
    case 'Withdraw':
    case 'WithdrawNFT':
      return tx.from;
    case 'ChangePubKey':
      return tx.account;
    case 'MintNFT':
      return tx.creatorAddress;
    case 'Swap':
      return tx.submitterAddress;
    case 'ForcedExit':
      return null;
  }
}

/**
 * Token the fee is paid in
 */
export function feeTokenOf(tx: RollupTransaction): number {
  switch (tx.type) {
    case 'Transfer':
    case 'ForcedExit':
      return tx.token;
    default:
      return tx.feeToken;
  }
}
