/**
 * Core primitives layer
 */

export type {
  Hex,
  Address,
  Hash,
  PubKeyHash,
  TxHash,
  Signature,
  Log,
  L1Receipt,
  TokenInfo,
  RPCError,
  JSONRPCRequest,
  JSONRPCResponse,
} from './types.js';

export {
  isHex,
  isHash,
  assertHex,
  bytesToHex,
  hexToBytes,
  numberToHex,
  hexToNumber,
  hexToBigInt,
  padHex,
  concatHex,
  concatBytes,
  uintToBytes,
  bytesToBigInt,
  stringToHex,
} from './hex.js';

export { keccak256, sha256, sha256Bytes, eventTopic, hashMessage } from './hash.js';

export {
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
} from './signature.js';

export {
  isAddress,
  assertAddress,
  toChecksumAddress,
  normalizeAddress,
  addressEquals,
  extractAddress,
  ZERO_ADDRESS,
} from './address.js';

export { parseUnits, formatUnits, formatUnitsFixed, addBasisPoints } from './units.js';

export {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  match,
  fromPromise,
  fromThrowable,
} from './result.js';
export type { Ok, Err, Result } from './result.js';

export { SecureKey } from './secure-key.js';
export { LRUCache } from './cache.js';
export type { LRUCacheOptions } from './cache.js';
export { systemClock, throwIfAborted } from './clock.js';
export type { Clock } from './clock.js';
export { pollUntil, backoffDelay } from './polling.js';
export type { PollSchedule, PollOptions, PollStep, PollOutcome } from './polling.js';
export { noopLogger, consoleLogger, createConsoleLogger, createPrefixedLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
