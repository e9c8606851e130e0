// src/dispatch/application/ToolDispatcher.ts

import type { Logger } from 'pino';

import type { NormalizedResult } from '../domain/NormalizedResult';
import type { ProviderConfig, ProviderId } from '../domain/Provider';
import type { IHttpExecutor } from '../domain/Upstream';
import {
  RateLimitedError,
  ToolDispatchError,
  UnknownToolError,
} from '../domain/errors';
import { parseToolArguments } from '../dto/ToolArgumentsDto';
import type { IRateLimiter } from './RateLimiter';
import { buildRequest, redactUrl } from './RequestBuilder';
import type { ResponseNormalizer } from './ResponseNormalizer';
import type { IToolRegistry } from './ToolRegistry';

/**
 * Dependencies for one server's dispatcher.
 * Injected for testability; built in bootstrap/buildDeps.
 */
export type ToolDispatcherDeps = {
  registry: IToolRegistry;
  providerConfigs: ReadonlyMap<ProviderId, ProviderConfig>;
  executor: IHttpExecutor;
  normalizer: Pick<ResponseNormalizer, 'normalize'>;
  rateLimiter?: IRateLimiter;
  logger?: Pick<Logger, 'info' | 'warn' | 'error'>;
  now?: () => number;
};

export interface IToolDispatcher {
  dispatch(toolName: string, args: unknown): Promise<NormalizedResult>;
}

/**
 * ToolDispatcher routes one invocation through
 * validate → rate limit → build → execute → normalize.
 *
 * Per-invocation failures never escape: they come back as
 * NormalizedResult{status: "error"}.
 */
export class ToolDispatcher implements IToolDispatcher {
  private readonly now: () => number;

  public constructor(private readonly deps: ToolDispatcherDeps) {
    this.now = deps.now ?? Date.now;
  }

  public async dispatch(toolName: string, args: unknown): Promise<NormalizedResult> {
    const startedAt = this.now();

    let result: NormalizedResult;
    try {
      result = await this.run(toolName, args);
    } catch (err) {
      result = this.toErrorResult(toolName, err);
    }

    const latencyMs = this.now() - startedAt;
    if (result.status === 'ok') {
      this.deps.logger?.info(
        { tool: toolName, status: result.status, truncated: result.truncated, latencyMs },
        'Tool invocation completed',
      );
    } else {
      this.deps.logger?.warn(
        { tool: toolName, status: result.status, errorCode: result.errorCode, latencyMs },
        'Tool invocation failed',
      );
    }

    return result;
  }

  private async run(toolName: string, args: unknown): Promise<NormalizedResult> {
    const spec = this.deps.registry.get(toolName);
    if (!spec) {
      throw new UnknownToolError(toolName);
    }

    const parsed = parseToolArguments(spec, args);

    const limiter = this.deps.rateLimiter;
    if (limiter && !limiter.tryAcquire()) {
      throw new RateLimitedError(limiter.limitPerMinute);
    }

    const providerConfig = this.deps.providerConfigs.get(spec.provider);
    if (!providerConfig) {
      throw new Error(`No provider config resolved for "${spec.provider}"`);
    }

    const request = buildRequest(spec.pathTemplate, parsed.path, providerConfig, parsed.query);
    this.deps.logger?.info(
      { tool: toolName, url: redactUrl(request.url, providerConfig) },
      'Calling upstream',
    );

    const response = await this.deps.executor.execute(request);

    return this.deps.normalizer.normalize(response.body, response.contentType, {
      tabular: spec.tabular,
      shape: spec.shape,
      args: parsed.all,
    });
  }

  private toErrorResult(toolName: string, err: unknown): NormalizedResult {
    if (err instanceof ToolDispatchError) {
      return {
        status: 'error',
        errorCode: err.code,
        errorDetail: err.message,
        ...(err.issues ? { issues: err.issues } : {}),
      };
    }

    this.deps.logger?.error({ tool: toolName, err }, 'Unexpected error during tool dispatch');

    return {
      status: 'error',
      errorCode: 'INTERNAL_ERROR',
      errorDetail: err instanceof Error ? err.message : 'Unexpected error',
    };
  }
}
