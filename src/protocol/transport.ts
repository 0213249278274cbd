/**
 * JSON-RPC transport
 *
 * One request/response call over fetch, with a per-attempt timeout, caller
 * cancellation, and retries with exponential backoff and jitter for transient
 * failures. Protocol rejections are mapped once and never retried.
 */

import type { JSONRPCRequest, RPCError } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import { systemClock, throwIfAborted } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import { noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { RollupError } from '../wallet/errors.js';
import { RejectedError, TransientError, WaitCancelledError } from '../wallet/errors.js';
import { isRecord } from './decode.js';

export interface TransportOptions {
  url: string;
  /** Per-attempt timeout (ms) */
  timeout?: number;
  /** Retries after the first attempt for transient failures */
  retries?: number;
  retryBaseDelay?: number;
  retryMaxDelay?: number;
  headers?: Record<string, string>;
  clock?: Clock;
  /** Jitter source in [0, 1) */
  random?: () => number;
  logger?: Logger;
  /** Turns a permanent JSON-RPC error into the error surfaced to callers */
  mapRejection?: (error: RPCError, method: string) => RollupError;
  fetch?: typeof fetch;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Standard JSON-RPC codes that never succeed on retry
 */
const PERMANENT_ERROR_CODES = new Set([-32700, -32600, -32601, -32602]);

const TRANSIENT_ERROR_PATTERNS = [
  'rate limit',
  'too many requests',
  'timeout',
  'timed out',
  'overloaded',
  'try again',
  'temporarily unavailable',
  'service unavailable',
  'connection reset',
  'econnreset',
  'socket hang up',
  'network error',
];

/**
 * Whether a JSON-RPC error may succeed on retry
 */
export function isTransientRPCError(error: RPCError): boolean {
  if (PERMANENT_ERROR_CODES.has(error.code)) return false;
  if (error.code === -32005) return true;
  const message = error.message.toLowerCase();
  return TRANSIENT_ERROR_PATTERNS.some((pattern) => message.includes(pattern));
}

export function defaultRejection(error: RPCError, method: string): RollupError {
  return new RejectedError('other', error.message, error.code, { method });
}

export class JsonRpcTransport {
  readonly url: string;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryBaseDelay: number;
  private readonly retryMaxDelay: number;
  private readonly headers: Record<string, string>;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly mapRejection: (error: RPCError, method: string) => RollupError;
  private readonly fetchImpl: typeof fetch | undefined;
  private requestId = 0;

  constructor(options: TransportOptions) {
    this.url = options.url;
    this.timeout = options.timeout ?? 30_000;
    this.retries = options.retries ?? 3;
    this.retryBaseDelay = options.retryBaseDelay ?? 500;
    this.retryMaxDelay = options.retryMaxDelay ?? 10_000;
    this.headers = options.headers ?? {};
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = createPrefixedLogger(options.logger ?? noopLogger, 'rpc');
    this.mapRejection = options.mapRejection ?? defaultRejection;
    this.fetchImpl = options.fetch;
  }

  /**
   * Delay before retry number `attempt` (0-based): equal jitter over an exponential cap
   */
  retryDelay(attempt: number): number {
    const cap = Math.min(this.retryMaxDelay, this.retryBaseDelay * 2 ** attempt);
    return Math.floor(cap / 2 + this.random() * (cap / 2));
  }

  /**
   * Call `method`, retrying transient failures. Resolves with the raw `result`.
   */
  async request(method: string, params: unknown[] = [], options: RequestOptions = {}): Promise<unknown> {
    const { signal } = options;
    let attempt = 0;

    for (;;) {
      throwIfAborted(signal, method);
      try {
        return await this.send(method, params, signal);
      } catch (error) {
        if (!(error instanceof TransientError) || attempt >= this.retries) {
          throw error;
        }
        const delay = error.retryAfter !== undefined && error.code === 'RATE_LIMITED'
          ? Math.min(error.retryAfter, this.retryMaxDelay)
          : this.retryDelay(attempt);
        this.logger.warn('Transient failure, retrying', {
          method,
          attempt: attempt + 1,
          retries: this.retries,
          delay,
          error: error.message,
        });
        attempt++;
        await this.clock.sleep(delay, signal);
      }
    }
  }

  private async send(method: string, params: unknown[], signal: AbortSignal | undefined): Promise<unknown> {
    const request: JSONRPCRequest = { jsonrpc: '2.0', id: ++this.requestId, method, params };

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const fetchImpl = this.fetchImpl ?? globalThis.fetch;

    try {
      let response: Response;
      try {
        response = await fetchImpl(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...this.headers },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
      } catch (error) {
        if (signal?.aborted) throw new WaitCancelledError(method);
        if (timedOut) {
          throw new TransientError({
            code: 'REQUEST_TIMEOUT',
            message: `${method} timed out after ${this.timeout}ms`,
            details: { method, url: this.url, timeout: this.timeout },
          });
        }
        throw new TransientError({
          code: 'CONNECTION_ERROR',
          message: `Failed to reach ${this.url}: ${error instanceof Error ? error.message : String(error)}`,
          details: { method, url: this.url },
          retryAfter: 5000,
        });
      }

      if (!response.ok) {
        throw this.httpError(method, response);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (signal?.aborted) throw new WaitCancelledError(method);
        throw new TransientError({
          code: 'INVALID_JSON',
          message: `${method} returned a body that is not JSON`,
          details: { method, cause: error instanceof Error ? error.message : String(error) },
        });
      }

      return this.unwrap(method, body);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private httpError(method: string, response: Response): RollupError {
    const status = response.status;
    if (status === 429) {
      const header = response.headers.get('retry-after');
      const seconds = header === null ? NaN : Number(header);
      return new TransientError({
        code: 'RATE_LIMITED',
        message: `${method} was rate limited (HTTP 429)`,
        details: { method, status },
        retryAfter: Number.isFinite(seconds) ? seconds * 1000 : 60_000,
      });
    }
    if (status >= 500) {
      return new TransientError({
        code: 'SERVER_ERROR',
        message: `HTTP ${status}: ${response.statusText}`,
        details: { method, status },
      });
    }
    return new RejectedError('other', `HTTP ${status}: ${response.statusText}`, undefined, { method, status });
  }

  private unwrap(method: string, body: unknown): unknown {
    if (!isRecord(body) || body['jsonrpc'] !== '2.0') {
      throw new TransientError({
        code: 'INVALID_JSON',
        message: `${method} returned a response that is not JSON-RPC 2.0`,
        details: { method },
      });
    }

    const error = body['error'];
    if (error !== undefined && error !== null) {
      const rpcError = toRPCError(error);
      if (isTransientRPCError(rpcError)) {
        throw new TransientError({
          code: 'RPC_TRANSIENT',
          message: rpcError.message,
          details: { method, rpcCode: rpcError.code },
        });
      }
      throw this.mapRejection(rpcError, method);
    }

    return body['result'] ?? null;
  }
}

function toRPCError(value: unknown): RPCError {
  if (isRecord(value)) {
    const code = typeof value['code'] === 'number' ? value['code'] : -32603;
    const message = typeof value['message'] === 'string' ? value['message'] : 'Unknown JSON-RPC error';
    return { code, message, data: value['data'] };
  }
  return { code: -32603, message: String(value) };
}
