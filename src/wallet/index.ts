/**
 * Wallet layer
 */

export { RollupWallet } from './wallet.js';
export type {
  RollupWalletOptions,
  AmountInput,
  TransactionOptions,
  TransferOptions,
  WithdrawOptions,
  SetSigningKeyOptions,
  ForcedExitOptions,
  MintNFTOptions,
  WithdrawNFTOptions,
  SignOrderOptions,
  SwapOptions,
  DepositOptions,
  FullExitOptions,
  SubmittedTransaction,
  SubmittedPriorityOperation,
} from './wallet.js';

export { resolveConfig, NETWORKS } from './config.js';
export type { RollupClientConfig, ResolvedConfig, NetworkPreset, NetworkEndpoints } from './config.js';

export {
  RollupError,
  ValidationError,
  InvalidAddressError,
  InvalidAmountError,
  PrecisionLossError,
  SigningError,
  TransientError,
  RejectedError,
  TimeoutError,
  WaitCancelledError,
  FeeTooHighError,
  FeeUnavailableError,
  toRollupError,
} from './errors.js';
export type { ErrorKind, RejectReason, ErrorDetails, PrecisionLoss } from './errors.js';
