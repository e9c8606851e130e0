// src/dispatch/infrastructure/FetchHttpExecutor.ts

/**
 * FetchHttpExecutor
 *
 * Infrastructure implementation of IHttpExecutor on top of the global
 * fetch. One GET per attempt, bounded by an abort timer that also covers
 * reading the body.
 *
 * Retry policy:
 * - HTTP 4xx (429 included) → never retried
 * - HTTP 5xx or TransportError (timeout / network) → retried once after
 *   retryDelayMs; a second failure propagates
 */

import type { Logger } from 'pino';

import type { IHttpExecutor, UpstreamRequest, UpstreamResponse } from '../domain/Upstream';
import { ToolDispatchError, TransportError, UpstreamError } from '../domain/errors';

/**
 * Minimal response surface we read from fetch.
 */
export type FetchResponseLike = {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
};

/**
 * Narrow fetch signature. The global fetch satisfies it; tests pass an
 * in-process stand-in.
 */
export type FetchFn = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export type FetchHttpExecutorOptions = {
  timeoutMs: number;
  retryDelayMs: number;
  fetchFn?: FetchFn;
  logger?: Pick<Logger, 'warn'>;
};

const BODY_SNIPPET_CHARS = 300;

export class FetchHttpExecutor implements IHttpExecutor {
  private readonly fetchFn: FetchFn;

  public constructor(private readonly options: FetchHttpExecutorOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  public async execute(request: UpstreamRequest): Promise<UpstreamResponse> {
    try {
      return await this.attempt(request);
    } catch (err) {
      if (!isRetryable(err)) {
        throw err;
      }

      this.options.logger?.warn(
        { host: request.url.host, path: request.url.pathname, err },
        'Transient upstream failure, retrying once',
      );

      await delay(this.options.retryDelayMs);
      return this.attempt(request);
    }
  }

  private async attempt(request: UpstreamRequest): Promise<UpstreamResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchFn(request.url.toString(), {
        method: 'GET',
        headers: request.headers,
        signal: controller.signal,
      });
      const body = await response.text();

      if (response.status >= 400) {
        throw new UpstreamError(
          response.status,
          snippet(body),
          response.headers.get('retry-after') ?? undefined,
        );
      }

      return {
        statusCode: response.status,
        body,
        contentType: response.headers.get('content-type'),
      };
    } catch (err) {
      if (err instanceof ToolDispatchError) {
        throw err;
      }

      if (controller.signal.aborted) {
        throw new TransportError('timeout', `timed out after ${this.options.timeoutMs}ms`);
      }

      throw new TransportError('network', err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timer);
    }
  }
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof TransportError) {
    return true;
  }
  return err instanceof UpstreamError && err.isServerError;
}

function snippet(body: string): string {
  const compact = body.replace(/\s+/g, ' ').trim();
  return compact.length > BODY_SNIPPET_CHARS
    ? `${compact.slice(0, BODY_SNIPPET_CHARS)}...`
    : compact;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
