// tests/infrastructure/fetchHttpExecutor.infrastructure.test.ts

/**
 * Tests for FetchHttpExecutor.
 *
 * A fake fetch stands in for the network so the retry policy can be
 * checked by counting calls:
 *  - 4xx (429 included) is never retried
 *  - 5xx and transport failures are retried exactly once
 */

import {
  FetchHttpExecutor,
  type FetchFn,
  type FetchResponseLike,
} from '../../src/dispatch/infrastructure/FetchHttpExecutor';
import { TransportError, UpstreamError } from '../../src/dispatch/domain/errors';
import type { UpstreamRequest } from '../../src/dispatch/domain/Upstream';
import { fakeFetch, jsonReply } from '../support/fakes';

const request: UpstreamRequest = {
  url: new URL('https://sportradar.example.test/mlb/trial/v8/en/injuries.json?api_key=test-secret'),
  headers: { Accept: 'application/json' },
};

function executor(fetchFn: FetchFn, timeoutMs = 1_000) {
  return new FetchHttpExecutor({ timeoutMs, retryDelayMs: 0, fetchFn });
}

describe('FetchHttpExecutor', () => {
  it('returns status, body and content type on success', async () => {
    const fetchFn = fakeFetch(jsonReply({ games: [] }));

    const response = await executor(fetchFn).execute(request);

    expect(response).toEqual({
      statusCode: 200,
      body: '{"games":[]}',
      contentType: 'application/json',
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);

    const url = fetchFn.mock.calls[0]?.[0];
    const init = fetchFn.mock.calls[0]?.[1];
    expect(url).toBe(request.url.toString());
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json' });
  });

  it('does not retry HTTP 429 and reports the status', async () => {
    const fetchFn = fakeFetch({ status: 429, body: 'slow down', headers: { 'Retry-After': '30' } });

    const failure = executor(fetchFn).execute(request);

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 429,
      retryAfter: '30',
      message: 'Upstream returned HTTP 429 (retry after 30): slow down',
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('does not retry other 4xx responses', async () => {
    const fetchFn = fakeFetch({ status: 404, body: '' });

    await expect(executor(fetchFn).execute(request)).rejects.toMatchObject({ statusCode: 404 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('retries a 5xx once and returns the second answer', async () => {
    const fetchFn = fakeFetch({ status: 503, body: 'unavailable' }, jsonReply({ ok: true }));

    const response = await executor(fetchFn).execute(request);

    expect(response.statusCode).toBe(200);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('propagates the second 5xx', async () => {
    const fetchFn = fakeFetch({ status: 502, body: 'bad gateway' });

    await expect(executor(fetchFn).execute(request)).rejects.toMatchObject({ statusCode: 502 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('maps connection failures to TransportError(network) after one retry', async () => {
    const fetchFn = fakeFetch(new Error('connect ECONNREFUSED'));

    const failure = executor(fetchFn).execute(request);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      reason: 'network',
      message: 'Upstream request failed (network): connect ECONNREFUSED',
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('maps an aborted request to TransportError(timeout)', async () => {
    const fetchFn = jest.fn<Promise<FetchResponseLike>, Parameters<FetchFn>>(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const failure = executor(fetchFn, 10).execute(request);

    await expect(failure).rejects.toMatchObject({
      reason: 'timeout',
      message: 'Upstream request failed (timeout): timed out after 10ms',
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('keeps at most 300 characters of an error body', async () => {
    const fetchFn = fakeFetch({ status: 400, body: 'x'.repeat(400) });

    await expect(executor(fetchFn).execute(request)).rejects.toMatchObject({
      bodySnippet: `${'x'.repeat(300)}...`,
    });
  });
});
