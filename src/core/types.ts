/**
 * Core type definitions for zk-rollup-client
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// Rollup public key hash, rendered as `pkh:` + 40 hex chars
export type PubKeyHash = `pkh:${string}`;

// Operator-assigned transaction identifier
export type TxHash = string & { readonly __brand: 'TxHash' };

// ECDSA signature components (L1)
export interface Signature {
  readonly r: Hex;
  readonly s: Hex;
  readonly v: number;
  readonly yParity: 0 | 1;
}

// L1 event log
export interface Log {
  address: Address;
  topics: Hash[];
  data: Hex;
  blockNumber: number;
  transactionHash: Hash;
  logIndex: number;
}

// L1 transaction receipt, reduced to what priority tracking reads
export interface L1Receipt {
  transactionHash: Hash;
  blockNumber: number;
  status: 'success' | 'reverted';
  logs: Log[];
}

// Token known to the operator
export interface TokenInfo {
  readonly id: number;
  readonly symbol: string;
  readonly address: Address;
  readonly decimals: number;
}

// RPC error
export interface RPCError {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

// JSON-RPC request
export interface JSONRPCRequest {
  readonly jsonrpc: '2.0';
  readonly id: number | string;
  readonly method: string;
  readonly params?: ReadonlyArray<unknown>;
}

// JSON-RPC response
export interface JSONRPCResponse<T = unknown> {
  readonly jsonrpc: '2.0';
  readonly id: number | string;
  readonly result?: T;
  readonly error?: RPCError;
}
