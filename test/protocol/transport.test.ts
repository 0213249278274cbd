import { describe, it, expect, vi, afterEach } from 'vitest';
import { JsonRpcTransport, isTransientRPCError, defaultRejection } from '../../src/protocol/transport.js';
import type { TransportOptions } from '../../src/protocol/transport.js';
import { RejectedError, TransientError, WaitCancelledError } from '../../src/wallet/errors.js';
import { FakeClock, fetchSequence, httpStatus, recordingLogger, requestBody, rpcError, rpcResult } from '../helpers/fakes.js';

const URL = 'http://operator.test/jsonrpc';

function transport(fetchImpl: typeof fetch, options: Partial<TransportOptions> = {}) {
  const clock = new FakeClock();
  const client = new JsonRpcTransport({ url: URL, fetch: fetchImpl, clock, random: () => 0.5, ...options });
  return { client, clock };
}

describe('JsonRpcTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('requests', () => {
    it('posts a JSON-RPC 2.0 envelope and returns the result', async () => {
      const fetchMock = fetchSequence(rpcResult({ nonce: 5 }));
      const { client } = transport(fetchMock, { headers: { 'X-Api-Key': 'test-key' } });

      await expect(client.request('account_info', ['0xabc'])).resolves.toEqual({ nonce: 5 });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const call = fetchMock.mock.calls[0];
      const init = call?.[1];
      expect(call?.[0]).toBe(URL);
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'X-Api-Key': 'test-key' });
      expect(requestBody(fetchMock)).toEqual({ jsonrpc: '2.0', id: 1, method: 'account_info', params: ['0xabc'] });
    });

    it('numbers requests sequentially', async () => {
      const fetchMock = fetchSequence(rpcResult(1));
      const { client } = transport(fetchMock);

      await client.request('a');
      await client.request('b');

      expect(requestBody(fetchMock, 1).id).toBe(2);
    });

    it('maps a missing result to null', async () => {
      const fetchMock = fetchSequence(rpcResult(undefined));
      const { client } = transport(fetchMock);

      await expect(client.request('tx_info')).resolves.toBeNull();
    });

    it('falls back to the global fetch', async () => {
      const fetchMock = fetchSequence(rpcResult('ok'));
      vi.stubGlobal('fetch', fetchMock);
      const client = new JsonRpcTransport({ url: URL, clock: new FakeClock() });

      await expect(client.request('ping')).resolves.toBe('ok');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('retries', () => {
    it('retries server errors with jittered backoff', async () => {
      const fetchMock = fetchSequence(httpStatus(503, 'Service Unavailable'), rpcResult('ok'));
      const logger = recordingLogger();
      const { client, clock } = transport(fetchMock, { logger });

      await expect(client.request('tx_info')).resolves.toBe('ok');

      expect(fetchMock).toHaveBeenCalledTimes(2);
      // cap 500ms, equal jitter at 0.5 -> 250 + 125
      expect(clock.sleeps).toEqual([375]);
      expect(logger.entries[0]).toMatchObject({ level: 'warn', message: '[rpc] Transient failure, retrying' });
    });

    it('gives up after the configured retries', async () => {
      const fetchMock = fetchSequence(httpStatus(502, 'Bad Gateway'));
      const { client, clock } = transport(fetchMock, { retries: 2 });

      await expect(client.request('tx_info')).rejects.toMatchObject({ code: 'SERVER_ERROR', kind: 'transient' });

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(clock.sleeps).toEqual([375, 750]);
    });

    it('waits for Retry-After on 429', async () => {
      const fetchMock = fetchSequence(httpStatus(429, 'Too Many Requests', { 'Retry-After': '2' }), rpcResult('ok'));
      const { client, clock } = transport(fetchMock);

      await client.request('tx_info');

      expect(clock.sleeps).toEqual([2000]);
    });

    it('retries transient JSON-RPC errors', async () => {
      const fetchMock = fetchSequence(rpcError(-32005, 'limit exceeded'), rpcResult('ok'));
      const { client } = transport(fetchMock);

      await expect(client.request('tx_info')).resolves.toBe('ok');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('retries connection failures', async () => {
      const fetchMock = fetchSequence(new TypeError('fetch failed'));
      const { client } = transport(fetchMock, { retries: 1 });

      const error = await client.request('tx_info').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ code: 'CONNECTION_ERROR' });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('never retries protocol rejections', async () => {
      const fetchMock = fetchSequence(rpcError(-32602, 'Invalid params'));
      const { client } = transport(fetchMock);

      const error = await client.request('tx_submit').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RejectedError);
      expect(error).toMatchObject({ reason: 'other', rpcCode: -32602, code: 'REJECTED_OTHER' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('never retries client HTTP errors', async () => {
      const fetchMock = fetchSequence(httpStatus(404, 'Not Found'));
      const { client } = transport(fetchMock);

      await expect(client.request('tx_info')).rejects.toThrow('HTTP 404: Not Found');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('applies a custom rejection mapper', async () => {
      const fetchMock = fetchSequence(rpcError(-32000, 'nonce is too low'));
      const mapRejection = vi.fn(() => new RejectedError('nonce_mismatch', 'nonce is too low'));
      const { client } = transport(fetchMock, { mapRejection });

      await expect(client.request('tx_submit')).rejects.toMatchObject({ reason: 'nonce_mismatch' });
      expect(mapRejection).toHaveBeenCalledWith({ code: -32000, message: 'nonce is too low', data: undefined }, 'tx_submit');
    });
  });

  describe('malformed responses', () => {
    it('treats a body that is not JSON-RPC as transient', async () => {
      const fetchMock = fetchSequence(new Response(JSON.stringify({ foo: 1 }), { status: 200 }));
      const { client } = transport(fetchMock, { retries: 0 });

      await expect(client.request('tx_info')).rejects.toMatchObject({ code: 'INVALID_JSON' });
    });

    it('treats a body that is not JSON as transient', async () => {
      const fetchMock = fetchSequence(new Response('<html>', { status: 200 }));
      const { client } = transport(fetchMock, { retries: 0 });

      await expect(client.request('tx_info')).rejects.toMatchObject({ code: 'INVALID_JSON', kind: 'transient' });
    });
  });

  describe('timeouts and cancellation', () => {
    it('aborts an attempt that exceeds the timeout', async () => {
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const { client } = transport(fetchMock, { timeout: 10, retries: 0 });

      await expect(client.request('tx_info')).rejects.toMatchObject({ code: 'REQUEST_TIMEOUT' });
    });

    it('does not send when the signal has already aborted', async () => {
      const fetchMock = fetchSequence(rpcResult('ok'));
      const { client } = transport(fetchMock);
      const controller = new AbortController();
      controller.abort();

      await expect(client.request('tx_info', [], { signal: controller.signal })).rejects.toBeInstanceOf(WaitCancelledError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('reports cancellation during a request', async () => {
      const controller = new AbortController();
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            controller.abort();
          })
      );
      const { client } = transport(fetchMock);

      await expect(client.request('tx_info', [], { signal: controller.signal })).rejects.toBeInstanceOf(WaitCancelledError);
    });
  });

  describe('retryDelay', () => {
    it('grows exponentially up to the cap', () => {
      const client = new JsonRpcTransport({ url: URL, random: () => 0, retryBaseDelay: 100, retryMaxDelay: 1000 });

      expect(client.retryDelay(0)).toBe(50);
      expect(client.retryDelay(1)).toBe(100);
      expect(client.retryDelay(5)).toBe(500);
    });
  });
});

describe('isTransientRPCError', () => {
  it('classifies standard codes and messages', () => {
    expect(isTransientRPCError({ code: -32005, message: 'limit' })).toBe(true);
    expect(isTransientRPCError({ code: -32000, message: 'Rate limit reached' })).toBe(true);
    expect(isTransientRPCError({ code: -32000, message: 'Nonce mismatch' })).toBe(false);
    expect(isTransientRPCError({ code: -32602, message: 'timeout' })).toBe(false);
  });
});

describe('defaultRejection', () => {
  it('wraps the RPC error', () => {
    const error = defaultRejection({ code: -32000, message: 'nope' }, 'tx_submit');
    expect(error).toBeInstanceOf(RejectedError);
    expect(error.details).toMatchObject({ method: 'tx_submit', rpcCode: -32000 });
  });
});
