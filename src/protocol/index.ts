/**
 * Protocol layer
 * Rollup transactions, signing, operator and L1 access, tracking
 */

// Packed amounts
export {
  AMOUNT_FORMAT,
  FEE_FORMAT,
  maxPackable,
  isPackable,
  closestPackable,
  closestGreaterOrEqPackable,
  pack,
  unpack,
  packAmount,
  packFee,
  isPackableAmount,
  isPackableFee,
  closestPackableAmount,
  closestPackableFee,
} from './packing.js';
export type { PackingFormat } from './packing.js';

// Tokens
export {
  MAX_FUNGIBLE_TOKEN_ID,
  MIN_NFT_TOKEN_ID,
  MAX_TOKEN_ID,
  isFungibleTokenId,
  isNFTTokenId,
  TokenRegistry,
} from './tokens.js';
export type { TokenLike, TokenSource } from './tokens.js';

// Transactions
export {
  DEFAULT_VALID_FROM,
  DEFAULT_VALID_UNTIL,
  buildTransfer,
  buildWithdraw,
  buildChangePubKey,
  buildForcedExit,
  buildMintNFT,
  buildWithdrawNFT,
  buildOrder,
  buildSwap,
  buildTransaction,
  transactionSender,
  feeTokenOf,
} from './transaction.js';
export type {
  TransactionType,
  EthAuthType,
  TimeRange,
  RollupSignature,
  Transfer,
  Withdraw,
  ChangePubKey,
  ForcedExit,
  MintNFT,
  WithdrawNFT,
  Order,
  SignedOrder,
  Swap,
  RollupTransaction,
  BuiltTransaction,
  TransferFields,
  WithdrawFields,
  ChangePubKeyFields,
  ForcedExitFields,
  MintNFTFields,
  WithdrawNFTFields,
  OrderFields,
  SwapFields,
  TransactionRequest,
} from './transaction.js';

// Canonical encoding
export {
  TRANSACTION_VERSION,
  ORDER_PREFIX,
  TX_TYPE_IDS,
  encodeOrder,
  encodeTransaction,
  transactionHash,
  isTxHash,
  toTxHash,
} from './encoding.js';

// Signing
export { secp256k1RollupCrypto, pubKeyHash, generateRollupKey } from './crypto.js';
export type { RollupCrypto } from './crypto.js';
export { changePubKeyMessage, transactionMessage } from './messages.js';
export type { TokenDisplay, TokenDisplayLookup } from './messages.js';
export { DualSigner } from './signer.js';
export type { L1SignaturePolicy, L1Signature, SignatureBundle, SignOptions, DualSignerConfig } from './signer.js';

// Transport and operator
export { JsonRpcTransport, isTransientRPCError, defaultRejection } from './transport.js';
export type { TransportOptions, RequestOptions } from './transport.js';
export {
  OperatorClient,
  classifyRejection,
  operatorRejection,
  parseAccountState,
  parseTransactionStatus,
  parsePriorityOpStatus,
  parseFeeEstimate,
  parseTokens,
  toWireTransaction,
} from './rpc.js';
export type {
  AccountBalances,
  AccountState,
  ContractAddresses,
  SubmitOptions,
  OperatorApi,
  OperatorClientOptions,
} from './rpc.js';

// L1
export {
  EthereumClient,
  NEW_PRIORITY_REQUEST_TOPIC,
  parseReceipt,
  decodePriorityRequest,
  findPriorityRequest,
} from './ethereum.js';
export type { PriorityOpType, PriorityRequestEvent, ReceiptSource } from './ethereum.js';

// Nonce management
export { NonceTracker, AsyncMutex } from './nonce.js';
export type { AccountSource, TrackedAccount, NonceContext, NonceTrackerConfig } from './nonce.js';

// Fees
export { FeeEstimator } from './fees.js';
export type { FeeTxType, FeeEstimate, FeeSource, FeeSuggestion, SuggestOptions, FeeEstimatorConfig } from './fees.js';

// Confirmation
export {
  TransactionTracker,
  DEFAULT_POLL_SCHEDULE,
  applyStatus,
  hasReached,
  isRegression,
  isTerminal,
} from './confirmation.js';
export type {
  ConfirmationStage,
  TargetStage,
  ObservedStatus,
  ConfirmationState,
  StatusSource,
  WaitOptions,
  TransactionTrackerConfig,
} from './confirmation.js';

// Priority operations
export { PriorityOperationTracker, priorityOutcome } from './priority.js';
export type {
  PriorityOpStatus,
  PriorityOperation,
  ConfirmationLevel,
  PriorityState,
  PriorityResult,
  PriorityRequest,
  PriorityOperationSubmitter,
  PriorityStatusSource,
  PriorityWaitOptions,
  PriorityOperationTrackerConfig,
} from './priority.js';
