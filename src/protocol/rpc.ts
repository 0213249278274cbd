/**
 * Operator JSON-RPC client
 * Typed wrappers over the operator API, with rejection classification
 */

import type { Address, PubKeyHash, RPCError, TokenInfo, TxHash } from '../core/types.js';
import type { RejectReason, RollupError } from '../wallet/errors.js';
import { RejectedError } from '../wallet/errors.js';
import type { RequestOptions, TransportOptions } from './transport.js';
import { JsonRpcTransport } from './transport.js';
import type { JsonRecord } from './decode.js';
import {
  asRecord,
  invalidResponse,
  readAddress,
  readBigInt,
  readBoolean,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readString,
  isRecord,
} from './decode.js';
import { isTxHash } from './encoding.js';
import type { ObservedStatus } from './confirmation.js';
import type { FeeEstimate, FeeTxType } from './fees.js';
import type { PriorityOpStatus } from './priority.js';
import type { SignatureBundle } from './signer.js';
import type { RollupSignature, RollupTransaction, SignedOrder, TimeRange } from './transaction.js';

export interface AccountBalances {
  readonly nonce: number;
  readonly pubKeyHash: PubKeyHash | null;
  /** Keyed by token symbol */
  readonly balances: Readonly<Record<string, bigint>>;
}

export interface AccountState extends AccountBalances {
  readonly address: Address;
  /** Null until the operator assigns an id (first deposit) */
  readonly id: number | null;
  readonly verified: AccountBalances;
}

export interface ContractAddresses {
  readonly mainContract: Address;
  readonly govContract: Address;
}

export interface SubmitOptions extends RequestOptions {
  fastProcessing?: boolean;
}

/**
 * What the rest of the client needs from the operator
 */
export interface OperatorApi {
  submitTransaction(tx: RollupTransaction, signatures: SignatureBundle, options?: SubmitOptions): Promise<TxHash>;
  getTransactionStatus(txHash: TxHash, options?: RequestOptions): Promise<ObservedStatus>;
  getAccountState(address: Address, options?: RequestOptions): Promise<AccountState>;
  estimateFee(txType: FeeTxType, address: Address, token: number | string, options?: RequestOptions): Promise<FeeEstimate>;
  getPriorityOperationStatus(serialId: bigint, options?: RequestOptions): Promise<PriorityOpStatus>;
  getTokens(options?: RequestOptions): Promise<TokenInfo[]>;
  getContractAddress(options?: RequestOptions): Promise<ContractAddresses>;
}

const REJECTION_PATTERNS: ReadonlyArray<readonly [RegExp, RejectReason]> = [
  [/nonce/i, 'nonce_mismatch'],
  [/not enough balance|insufficient (balance|funds)/i, 'insufficient_balance'],
  [/signature/i, 'invalid_signature'],
  [/fee/i, 'fee_too_low'],
  [/locked|pubkey hash is not set|no signing key/i, 'account_locked'],
  [/not found|unknown account|does not exist/i, 'not_found'],
  [/invalid|incorrect|malformed|wrong/i, 'invalid_params'],
];

/**
 * Map an operator error to a rejection reason
 */
export function classifyRejection(error: RPCError): RejectReason {
  for (const [pattern, reason] of REJECTION_PATTERNS) {
    if (pattern.test(error.message)) return reason;
  }
  if (error.code === -32602 || error.code === -32600) return 'invalid_params';
  if (error.code === -32601) return 'not_found';
  return 'other';
}

export function operatorRejection(error: RPCError, method: string): RollupError {
  return new RejectedError(classifyRejection(error), error.message, error.code, { method });
}

const ZERO_PUBKEY_HASH = /^(sync|pkh):0{40}$/i;

function parsePubKeyHash(value: string | null): PubKeyHash | null {
  if (value === null || ZERO_PUBKEY_HASH.test(value)) return null;
  const match = /^(?:sync|pkh):([0-9a-fA-F]{40})$/.exec(value);
  if (match === null || match[1] === undefined) throw invalidResponse('pubKeyHash', value);
  return `pkh:${match[1].toLowerCase()}`;
}

function parseBalances(record: JsonRecord): AccountBalances {
  const rawBalances = asRecord(record['balances'] ?? {}, 'balances');
  const balances: Record<string, bigint> = {};
  for (const symbol of Object.keys(rawBalances)) {
    balances[symbol] = readBigInt(rawBalances, symbol);
  }
  return {
    nonce: readNumber(record, 'nonce'),
    pubKeyHash: parsePubKeyHash(readOptionalString(record, 'pubKeyHash')),
    balances,
  };
}

export function parseAccountState(address: Address, raw: unknown): AccountState {
  // Unknown accounts come back as null: nonce 0, no id, no key
  if (raw === null) {
    const empty: AccountBalances = { nonce: 0, pubKeyHash: null, balances: {} };
    return { address, id: null, ...empty, verified: empty };
  }
  const record = asRecord(raw, 'account_info result');
  const committed = parseBalances(asRecord(record['committed'], 'committed'));
  const verified = isRecord(record['verified']) ? parseBalances(record['verified']) : committed;
  return {
    address: readAddress(record, 'address'),
    id: readOptionalNumber(record, 'id'),
    ...committed,
    verified,
  };
}

export function parseTransactionStatus(raw: unknown): ObservedStatus {
  if (raw === null) return { status: 'unknown' };
  const record = asRecord(raw, 'tx_info result');

  if (!readBoolean(record, 'executed')) return { status: 'pending' };

  const success = record['success'];
  if (success === false) {
    return { status: 'failed', reason: readOptionalString(record, 'failReason') ?? 'unknown reason' };
  }

  const block = record['block'];
  if (!isRecord(block)) return { status: 'pending' };

  const blockNumber = readNumber(block, 'blockNumber');
  if (block['finalized'] === true) return { status: 'executed', blockNumber };
  if (readBoolean(block, 'verified')) return { status: 'verified', blockNumber };
  if (readBoolean(block, 'committed')) return { status: 'committed', blockNumber };
  return { status: 'pending' };
}

export function parsePriorityOpStatus(raw: unknown): PriorityOpStatus {
  if (raw === null) return { executed: false, block: null };
  const record = asRecord(raw, 'ethop_info result');
  const block = record['block'];
  const status: PriorityOpStatus = {
    executed: readBoolean(record, 'executed'),
    block: isRecord(block)
      ? {
          blockNumber: readNumber(block, 'blockNumber'),
          committed: readBoolean(block, 'committed'),
          verified: readBoolean(block, 'verified'),
        }
      : null,
  };
  if (record['success'] === false) {
    return { ...status, success: false, failReason: readOptionalString(record, 'failReason') ?? 'unknown reason' };
  }
  return status;
}

export function parseFeeEstimate(txType: FeeTxType, token: number | string, raw: unknown): FeeEstimate {
  const record = asRecord(raw, 'get_tx_fee result');
  return {
    txType,
    token,
    gasTxAmount: readBigInt(record, 'gasTxAmount'),
    gasPriceWei: readBigInt(record, 'gasPriceWei'),
    gasFee: readBigInt(record, 'gasFee'),
    zkpFee: readBigInt(record, 'zkpFee'),
    totalFee: readBigInt(record, 'totalFee'),
  };
}

export function parseTokens(raw: unknown): TokenInfo[] {
  const record = asRecord(raw, 'tokens result');
  return Object.values(record).map((value) => {
    const token = asRecord(value, 'token');
    return {
      id: readNumber(token, 'id'),
      symbol: readString(token, 'symbol'),
      address: readAddress(token, 'address'),
      decimals: readNumber(token, 'decimals'),
    };
  });
}

// ============ Wire format ============

function timestamp(value: bigint): number | string {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}

function timeRangeJson(range: TimeRange): { validFrom: number | string; validUntil: number | string } {
  return { validFrom: timestamp(range.validFrom), validUntil: timestamp(range.validUntil) };
}

function orderJson(order: SignedOrder): JsonRecord {
  return {
    accountId: order.accountId,
    recipient: order.recipient,
    nonce: order.nonce,
    tokenSell: order.tokenSell,
    tokenBuy: order.tokenBuy,
    ratio: [order.ratio[0].toString(), order.ratio[1].toString()],
    amount: order.amount.toString(),
    ...timeRangeJson(order),
    signature: order.signature,
  };
}

/**
 * JSON body for `tx_submit`; amounts travel as decimal strings
 */
export function toWireTransaction(tx: RollupTransaction, signature: RollupSignature): JsonRecord {
  switch (tx.type) {
    case 'ChangePubKey':
      return { ...stringifyAmounts(tx), ethAuthData: { type: tx.ethAuthType }, signature };
    case 'Swap':
      return {
        type: tx.type,
        submitterId: tx.submitterId,
        submitterAddress: tx.submitterAddress,
        nonce: tx.nonce,
        orders: [orderJson(tx.orders[0]), orderJson(tx.orders[1])],
        amounts: [tx.amounts[0].toString(), tx.amounts[1].toString()],
        feeToken: tx.feeToken,
        fee: tx.fee.toString(),
        signature,
      };
    default:
      return { ...stringifyAmounts(tx), signature };
  }
}

function stringifyAmounts(tx: Exclude<RollupTransaction, { type: 'Swap' }>): JsonRecord {
  const out: JsonRecord = {};
  for (const [key, value] of Object.entries(tx)) {
    if (key === 'ethAuthType' || key === 'fastProcessing') continue;
    if (typeof value !== 'bigint') {
      out[key] = value;
    } else {
      out[key] = key === 'validFrom' || key === 'validUntil' ? timestamp(value) : value.toString();
    }
  }
  return out;
}

function feeTypeJson(txType: FeeTxType): unknown {
  switch (txType) {
    case 'ChangePubKey':
      return { ChangePubKey: 'ECDSA' };
    case 'ChangePubKeyOnchain':
      return { ChangePubKey: 'Onchain' };
    default:
      return txType;
  }
}

export type OperatorClientOptions = Omit<TransportOptions, 'mapRejection'>;

export class OperatorClient implements OperatorApi {
  private readonly transport: JsonRpcTransport;

  constructor(options: OperatorClientOptions | JsonRpcTransport) {
    this.transport =
      options instanceof JsonRpcTransport
        ? options
        : new JsonRpcTransport({ ...options, mapRejection: operatorRejection });
  }

  get url(): string {
    return this.transport.url;
  }

  async submitTransaction(tx: RollupTransaction, signatures: SignatureBundle, options: SubmitOptions = {}): Promise<TxHash> {
    const params: unknown[] = [toWireTransaction(tx, signatures.rollup), signatures.l1 ?? null];
    const fastProcessing = options.fastProcessing ?? (tx.type === 'Withdraw' && tx.fastProcessing);
    if (fastProcessing) params.push(true);

    const result = await this.transport.request('tx_submit', params, options);
    if (typeof result !== 'string') throw invalidResponse('tx_submit result', result);
    const normalized = result.toLowerCase();
    if (!isTxHash(normalized)) throw invalidResponse('tx_submit result', result);
    return normalized;
  }

  async getTransactionStatus(txHash: TxHash, options?: RequestOptions): Promise<ObservedStatus> {
    return parseTransactionStatus(await this.transport.request('tx_info', [txHash], options));
  }

  async getAccountState(address: Address, options?: RequestOptions): Promise<AccountState> {
    return parseAccountState(address, await this.transport.request('account_info', [address], options));
  }

  async estimateFee(txType: FeeTxType, address: Address, token: number | string, options?: RequestOptions): Promise<FeeEstimate> {
    const raw = await this.transport.request('get_tx_fee', [feeTypeJson(txType), address, token], options);
    return parseFeeEstimate(txType, token, raw);
  }

  async getPriorityOperationStatus(serialId: bigint, options?: RequestOptions): Promise<PriorityOpStatus> {
    const id = serialId <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(serialId) : serialId.toString();
    return parsePriorityOpStatus(await this.transport.request('ethop_info', [id], options));
  }

  async getTokens(options?: RequestOptions): Promise<TokenInfo[]> {
    return parseTokens(await this.transport.request('tokens', [], options));
  }

  async getContractAddress(options?: RequestOptions): Promise<ContractAddresses> {
    const record = asRecord(await this.transport.request('contract_address', [], options), 'contract_address result');
    return { mainContract: readAddress(record, 'mainContract'), govContract: readAddress(record, 'govContract') };
  }
}
