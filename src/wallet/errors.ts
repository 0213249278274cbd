/**
 * Rollup client error taxonomy
 * Structured errors that tell callers whether to rebuild, wait, or abort
 */

export type ErrorKind = 'validation' | 'signing' | 'transient' | 'rejected' | 'timeout' | 'fee' | 'unknown';

/**
 * Operator rejection classification
 */
export type RejectReason =
  | 'nonce_mismatch'
  | 'insufficient_balance'
  | 'invalid_signature'
  | 'fee_too_low'
  | 'account_locked'
  | 'invalid_params'
  | 'not_found'
  | 'l1_reverted'
  | 'other';

export interface ErrorDetails {
  code: string;
  message: string;
  kind?: ErrorKind;
  details?: Record<string, unknown>;
  suggestion?: string;
  retryable?: boolean;
  retryAfter?: number;
}

type SubclassConfig = Omit<ErrorDetails, 'code' | 'kind'> & { code?: string };

/**
 * Base error class for every failure the client surfaces
 */
export class RollupError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable: boolean;
  readonly retryAfter?: number;

  constructor(config: ErrorDetails) {
    super(config.message);
    this.name = 'RollupError';
    this.code = config.code;
    this.kind = config.kind ?? 'unknown';
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and try again';
    this.retryable = config.retryable ?? false;
    if (config.retryAfter !== undefined) {
      this.retryAfter = config.retryAfter;
    }
  }

  toJSON(): ErrorDetails {
    const result: ErrorDetails = {
      code: this.code,
      message: this.message,
      kind: this.kind,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
    if (this.retryAfter !== undefined) {
      result.retryAfter = this.retryAfter;
    }
    return result;
  }

  toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

// ============ Validation Errors ============

export class ValidationError extends RollupError {
  constructor(config: SubclassConfig) {
    super({ ...config, code: config.code ?? 'VALIDATION_ERROR', kind: 'validation', retryable: false });
    this.name = 'ValidationError';
  }
}

export class InvalidAddressError extends ValidationError {
  constructor(address: string, field = 'address') {
    super({
      code: 'INVALID_ADDRESS',
      message: `Invalid ${field}: ${address}`,
      details: { address, field },
      suggestion: 'Provide a 0x-prefixed address of 40 hex characters',
    });
    this.name = 'InvalidAddressError';
  }
}

export class InvalidAmountError extends ValidationError {
  constructor(field: string, value: bigint | number | string, reason: string) {
    super({
      code: 'INVALID_AMOUNT',
      message: `Invalid ${field} "${String(value)}": ${reason}`,
      details: { field, value: String(value), reason },
      suggestion: 'Provide a non-negative amount within the range the rollup can encode',
    });
    this.name = 'InvalidAmountError';
  }
}

export interface PrecisionLoss {
  readonly field: string;
  readonly requested: bigint;
  readonly packed: bigint;
}

export class PrecisionLossError extends ValidationError {
  readonly losses: readonly PrecisionLoss[];

  constructor(losses: readonly PrecisionLoss[]) {
    const fields = losses.map((l) => `${l.field} ${l.requested} -> ${l.packed}`).join(', ');
    super({
      code: 'PRECISION_LOSS',
      message: `Amounts are not exactly representable: ${fields}`,
      details: {
        losses: losses.map((l) => ({ field: l.field, requested: l.requested.toString(), packed: l.packed.toString() })),
      },
      suggestion: 'Use the rounded amounts or pass allowPrecisionLoss to accept them',
    });
    this.name = 'PrecisionLossError';
    this.losses = losses;
  }
}

// ============ Signing Errors ============

export class SigningError extends RollupError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super({
      code: 'SIGNING_ERROR',
      kind: 'signing',
      message: `Signing failed: ${reason}`,
      details: { reason, ...details },
      suggestion: 'Check that the signing keys are present, not disposed and match the account',
      retryable: false,
    });
    this.name = 'SigningError';
  }
}

// ============ Network Errors ============

export class TransientError extends RollupError {
  constructor(config: SubclassConfig) {
    super({
      retryAfter: 1000,
      ...config,
      code: config.code ?? 'TRANSIENT_ERROR',
      kind: 'transient',
      retryable: true,
      suggestion: config.suggestion ?? 'The request may succeed later; retry after a delay',
    });
    this.name = 'TransientError';
  }
}

export class RejectedError extends RollupError {
  readonly reason: RejectReason;
  readonly rpcCode: number | undefined;

  constructor(reason: RejectReason, message: string, rpcCode?: number, details?: Record<string, unknown>) {
    super({
      code: `REJECTED_${reason.toUpperCase()}`,
      kind: 'rejected',
      message,
      details: { reason, rpcCode, ...details },
      suggestion: rejectSuggestions[reason],
      retryable: false,
    });
    this.name = 'RejectedError';
    this.reason = reason;
    this.rpcCode = rpcCode;
  }
}

const rejectSuggestions: Record<RejectReason, string> = {
  nonce_mismatch: 'Resync the account nonce and rebuild the transaction',
  insufficient_balance: 'Top up the account or reduce the amount',
  invalid_signature: 'Check that the signing key is registered for this account',
  fee_too_low: 'Re-estimate the fee and rebuild the transaction',
  account_locked: 'Register a signing key with setSigningKey first',
  invalid_params: 'Check the transaction fields',
  not_found: 'Check the identifier and try again',
  l1_reverted: 'Inspect the base-chain transaction; the operation was not queued',
  other: 'Inspect the operator message and rebuild the transaction',
};

// ============ Waiting Errors ============

/**
 * Waiting exceeded its budget. The underlying operation may still complete;
 * `lastState` lets callers resume tracking.
 */
export class TimeoutError<S = unknown> extends RollupError {
  readonly lastState: S | undefined;

  constructor(operation: string, waited: number, lastState?: S, details?: Record<string, unknown>) {
    super({
      code: 'TIMEOUT',
      kind: 'timeout',
      message: `Timed out waiting for ${operation} after ${waited}ms`,
      details: { operation, waited, ...details },
      suggestion: 'The operation may still complete; resume tracking later',
      retryable: true,
      retryAfter: 5000,
    });
    this.name = 'TimeoutError';
    this.lastState = lastState;
  }
}

export class WaitCancelledError extends RollupError {
  constructor(operation = 'operation') {
    super({
      code: 'WAIT_CANCELLED',
      kind: 'timeout',
      message: `Waiting for ${operation} was cancelled`,
      details: { operation },
      suggestion: 'Cancellation only stops local waiting; submitted transactions are not retracted',
      retryable: true,
    });
    this.name = 'WaitCancelledError';
  }
}

// ============ Fee Errors ============

export class FeeTooHighError extends RollupError {
  constructor(fee: bigint, maxFee: bigint, token: string) {
    super({
      code: 'FEE_TOO_HIGH',
      kind: 'fee',
      message: `Fee ${fee} ${token} exceeds maximum ${maxFee}`,
      details: { fee: fee.toString(), maxFee: maxFee.toString(), token },
      suggestion: 'Raise maxFee or wait for lower fees',
      retryable: false,
    });
    this.name = 'FeeTooHighError';
  }
}

export class FeeUnavailableError extends RollupError {
  constructor(txType: string, token: string, reason: string) {
    super({
      code: 'FEE_UNAVAILABLE',
      kind: 'fee',
      message: `Operator cannot price ${txType} in ${token}: ${reason}`,
      details: { txType, token, reason },
      suggestion: 'Pay the fee in a different token',
      retryable: false,
    });
    this.name = 'FeeUnavailableError';
  }
}

/**
 * Normalise anything thrown into a RollupError
 */
export function toRollupError(error: unknown): RollupError {
  if (error instanceof RollupError) {
    return error;
  }
  return new RollupError({
    code: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error),
    details: { error: error instanceof Error ? error.name : typeof error },
    retryable: false,
  });
}
